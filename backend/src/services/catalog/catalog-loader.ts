/**
 * Catalog Loader
 *
 * Reads the persona and topic catalogs from JSON files and validates them.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { createLogger } from '../../utils/logger.js';
import type { Persona } from '../../types/session.js';

const logger = createLogger({ module: 'CatalogLoader' });

export const PERSONAS_FILE = 'personas.json';
export const TOPICS_FILE = 'topics.json';

// ===========================================================================
// Validation Schemas
// ===========================================================================

const PersonaSchema = z.object({
  id: z.string().min(1).regex(/^[a-z0-9_-]+$/, 'Persona id must be lowercase, digits, - or _'),
  name: z.string().min(1).max(40),
  avatar: z.string().min(1).max(8),
  color: z.string().regex(/^#[0-9a-fA-F]{6}$/, 'Persona color must be #rrggbb'),
  role: z.string().min(1),
  personality: z.string().min(1),
  style: z.string().min(1),
});

const PersonaCatalogSchema = z
  .array(PersonaSchema)
  .min(2, 'At least two personas are required')
  .refine((personas) => new Set(personas.map((persona) => persona.id)).size === personas.length, {
    message: 'Persona ids must be unique',
  });

const TopicCatalogSchema = z
  .array(z.string().trim().min(1))
  .min(1, 'At least one topic is required');

export interface Catalog {
  personas: Persona[];
  topics: string[];
}

export class CatalogError extends Error {
  public readonly file: string;

  constructor(file: string, message: string) {
    super(`${file}: ${message}`);
    this.name = 'CatalogError';
    this.file = file;
  }
}

function readJson(file: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf-8');
  } catch (error) {
    throw new CatalogError(file, error instanceof Error ? error.message : String(error));
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new CatalogError(file, `invalid JSON (${error instanceof Error ? error.message : String(error)})`);
  }
}

function describeIssues(error: z.ZodError): string {
  return error.errors
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function parsePersonas(data: unknown, source: string = PERSONAS_FILE): Persona[] {
  const parsed = PersonaCatalogSchema.safeParse(data);
  if (!parsed.success) {
    throw new CatalogError(source, describeIssues(parsed.error));
  }
  return parsed.data;
}

export function parseTopics(data: unknown, source: string = TOPICS_FILE): string[] {
  const parsed = TopicCatalogSchema.safeParse(data);
  if (!parsed.success) {
    throw new CatalogError(source, describeIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Load both catalogs from `dir`
 */
export function loadCatalog(dir: string): Catalog {
  const personasPath = path.join(dir, PERSONAS_FILE);
  const topicsPath = path.join(dir, TOPICS_FILE);

  const personas = parsePersonas(readJson(personasPath), personasPath);
  const topics = parseTopics(readJson(topicsPath), topicsPath);

  logger.info({ dir, personas: personas.length, topics: topics.length }, 'Catalog loaded');
  return { personas, topics };
}
