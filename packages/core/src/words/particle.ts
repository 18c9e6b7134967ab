// navi-morph/words/particle - Word order around particles

import type { ParticleType } from './types.js';

export const VOCATIVE_MARKER = 'ma';

/**
 * Place a particle relative to its context: question particles lead, the
 * vocative uses "ma" before the addressee, everything else follows.
 */
export function placeParticle(particle: string, type: ParticleType, context: string): string {
  switch (type) {
    case 'question':
      return `${particle} ${context}`;
    case 'vocative':
      return `${VOCATIVE_MARKER} ${context}`;
    case 'negative':
      return `${context} ${particle}`;
    case 'general':
      return `${context} ${particle}`;
  }
}
