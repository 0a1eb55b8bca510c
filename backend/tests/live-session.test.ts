/**
 * Live Session Wiring Tests
 */

import { describe, it, expect } from 'vitest';
import { sessionConfig } from '../src/config/session.js';
import { createLiveSession } from '../src/services/session/live-session.js';
import { createRandom } from '../src/utils/random.js';
import { ManualClock } from './helpers/manual-clock.js';
import { MockRequest, MockResponse } from './helpers/mock-http.js';
import { PERSONA_A, PERSONA_B, ScriptedContentSource, ofType, recordBus } from './helpers/fixtures.js';

function createSession(listenerCapacity: number) {
  return createLiveSession({
    config: { ...sessionConfig, maxUptimeMs: 600_000, listenerCapacity },
    catalog: { personas: [PERSONA_A, PERSONA_B], topics: ['Is soup a drink?'] },
    content: new ScriptedContentSource(),
    clock: new ManualClock(),
    random: createRandom(7),
  });
}

describe('createLiveSession', () => {
  it('draws the two personas from the catalog', () => {
    const session = createSession(400);

    expect(session.state.personas.map((persona) => persona.id).sort()).toEqual(['alpha', 'beta']);
    expect(session.rotator.size).toBe(1);
  });

  it('disconnects a viewer the bus dropped and refreshes presence', () => {
    const session = createSession(3);
    const recorder = recordBus(session.bus);
    const res = new MockResponse();
    res.accepting = false;

    session.sse.registerClient(new MockRequest(), res);
    recorder.events();
    for (let i = 0; i < 3; i++) {
      session.ingress.publishPresence();
      recorder.events();
    }

    expect(session.sse.getClientCount()).toBe(0);
    expect(res.writableEnded).toBe(true);
    expect(session.bus.listenerCount).toBe(1);

    const presence = ofType(recorder.events(), 'presence');
    expect(presence[presence.length - 1]?.data).toEqual({ users: [], viewers: 1 });
  });
});
