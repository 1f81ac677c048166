#!/usr/bin/env npx tsx
/**
 * Keycode generator CLI
 *
 * Builds one keycode for a device and prints it with the id actually used.
 * Record that id: the next code for the device must use a higher one.
 *
 * Run with: npm run generate -- --family full --command add-credit --id 12 --hours 48 --key <32 hex chars>
 */

import { parseArgs } from 'node:util';
import { configure, getConsoleSink, getLogger } from '@logtape/logtape';
import { KeycodeGenerator, KeycodeError, loadConfigFromEnv } from '../src/index.js';
import { buildMessage, CLI_OPTIONS, USAGE } from './keycode-args.js';

const logger = getLogger(['keycode', 'cli']);

const { values } = parseArgs({ options: CLI_OPTIONS });

async function main(): Promise<number> {
  await configure({
    sinks: { console: getConsoleSink() },
    loggers: [
      { category: ['keycode'], lowestLevel: values.verbose ? 'debug' : 'info', sinks: ['console'] },
      { category: ['logtape', 'meta'], lowestLevel: 'warning', sinks: ['console'] },
    ],
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  try {
    const config = loadConfigFromEnv();
    const generator = new KeycodeGenerator({ ...config, obscure: values.obscure || config.obscure });
    const result = generator.generate(buildMessage(values));

    console.log(`\n   Keycode:   ${result.keycode}`);
    console.log(`   Type:      ${result.type}`);
    console.log(`   Id used:   ${result.id}${result.attempts > 1 ? ` (after ${result.attempts} attempts)` : ''}\n`);
    return 0;
  } catch (error) {
    if (error instanceof KeycodeError) {
      logger.error('{name}: {message}', { name: error.name, message: error.message, code: error.code });
    } else {
      logger.error('{message}', { message: error instanceof Error ? error.message : String(error) });
      console.error(`\n${USAGE}`);
    }
    return 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
