import { getLogger } from '@logtape/logtape';
import { parseGeneratorConfig, type GeneratorConfig, type GeneratorConfigInput } from './config.js';
import { encodeKeycode } from './encoder.js';
import { IdCollisionError } from './errors.js';
import type { GeneratedKeycode, KeycodeMessage } from './types.js';

const logger = getLogger(['keycode', 'generator']);

/**
 * Caller-side keycode generation with a bounded id retry policy.
 *
 * Holds no key material: every message carries its own secret, so one
 * generator can serve many devices concurrently.
 */
export class KeycodeGenerator {
  private readonly config: GeneratorConfig;

  constructor(config: GeneratorConfigInput = {}) {
    this.config = parseGeneratorConfig(config);
  }

  getConfig(): Readonly<GeneratorConfig> {
    return this.config;
  }

  /**
   * Encode a message, moving to the suggested next id on each collision.
   * Returns the id actually used; the caller must record it.
   */
  generate(message: KeycodeMessage): GeneratedKeycode {
    const { maxCollisionRetries, obscure } = this.config;
    let id = message.id;

    for (let attempt = 1; ; attempt++) {
      try {
        const keycode = encodeKeycode({ ...message, id }, { obscure });
        if (attempt > 1) {
          logger.debug('Encoded {type} with id {id} after {attempts} attempts', {
            type: message.type,
            id,
            attempts: attempt,
          });
        }
        return { keycode, type: message.type, id, attempts: attempt };
      } catch (error) {
        if (!(error instanceof IdCollisionError)) throw error;

        if (attempt > maxCollisionRetries) {
          logger.warn('Giving up on {type}: ids {firstId}..{id} all collide', {
            type: message.type,
            firstId: message.id,
            id,
          });
          throw error;
        }
        logger.debug('Id {id} collides with {rival} for {type}, retrying with {nextId}', {
          type: message.type,
          id,
          rival: error.rival,
          nextId: error.nextId,
        });
        id = error.nextId;
      }
    }
  }
}
