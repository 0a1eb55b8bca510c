/**
 * Catalog Loader Tests
 */

import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { CatalogError, loadCatalog, parsePersonas, parseTopics } from '../src/services/catalog/catalog-loader.js';
import { PERSONA_A, PERSONA_B } from './helpers/fixtures.js';

const DATA_DIR = fileURLToPath(new URL('../data', import.meta.url));

describe('loadCatalog', () => {
  it('loads the bundled personas and topics', () => {
    const catalog = loadCatalog(DATA_DIR);

    expect(catalog.personas.length).toBeGreaterThanOrEqual(2);
    expect(new Set(catalog.personas.map((persona) => persona.id)).size).toBe(catalog.personas.length);
    expect(catalog.topics.length).toBeGreaterThan(10);
  });

  it('reports a missing directory', () => {
    expect(() => loadCatalog(fileURLToPath(new URL('./no-such-dir', import.meta.url)))).toThrow(CatalogError);
  });
});

describe('parsePersonas', () => {
  it('accepts a valid list', () => {
    expect(parsePersonas([PERSONA_A, PERSONA_B])).toEqual([PERSONA_A, PERSONA_B]);
  });

  it('needs at least two personas', () => {
    expect(() => parsePersonas([PERSONA_A])).toThrow('At least two personas are required');
  });

  it('rejects duplicate ids', () => {
    expect(() => parsePersonas([PERSONA_A, { ...PERSONA_B, id: 'alpha' }])).toThrow('Persona ids must be unique');
  });

  it('names the offending field', () => {
    expect(() => parsePersonas([PERSONA_A, { ...PERSONA_B, color: 'blue' }])).toThrow(
      'personas.json: 1.color: Persona color must be #rrggbb'
    );
  });
});

describe('parseTopics', () => {
  it('trims topics', () => {
    expect(parseTopics(['  Is soup a drink? '])).toEqual(['Is soup a drink?']);
  });

  it('rejects an empty list and blank entries', () => {
    expect(() => parseTopics([])).toThrow('At least one topic is required');
    expect(() => parseTopics(['ok', '  '])).toThrow(CatalogError);
  });
});
