import {
  hexToBytes,
  fullAddCredit,
  fullSetCredit,
  fullUnlock,
  fullWipeState,
  fullFactoryTest,
  fullPassthrough,
  smallAddCredit,
  smallSetCredit,
  smallMaintenance,
  smallFactoryTest,
  smallWipeRestrictedFlag,
  smallSetCreditWipeFlag,
  smallPassthrough,
  unlinkAllAccessories,
  unlockAllAccessories,
  unlockAccessory,
  unlinkAccessory,
  linkAccessoryMode3,
  smallUnlinkAllAccessories,
  smallUnlockAllAccessories,
  smallSetCreditWipeRestrictedFlag,
  type FullFactoryTest,
  type FullWipeFlags,
  type KeycodeMessage,
  type SmallFactoryAction,
  type SmallMaintenanceAction,
} from '../src/index.js';

export const USAGE = `Usage: generate-keycode --family <full|small> --command <name> [options]

Full commands:   add-credit --hours N | set-credit --hours N | unlock | wipe --flags F
                 factory --test ALLOW_TEST|OQC_TEST|DISPLAY_ID
                 unlink-all-accessories | unlock-all-accessories
                 unlink-accessory --accessory-id N | unlock-accessory --accessory-id N
                 link-accessory --accessory-id N --accessory-key HEX --accessory-count N
                   (all accessory commands take --controller-key HEX --controller-count N)
Small commands:  add-credit --days N|unlock | set-credit --days N|unlock
                 maintenance --action WIPE_STATE_0|WIPE_STATE_1|WIPE_IDS_ALL
                 factory --action SHORT_TEST|OQC_TEST
                 wipe-restricted-flag | set-credit-wipe-flag --days N|unlock
                 unlink-all-accessories | unlock-all-accessories
                 passthrough-set-credit-wipe-flag --days N|unlock

Accessory ids are decimal or 0x-prefixed hex.

Common options:  --id N  --key HEX  --obscure  --verbose`;

export const CLI_OPTIONS = {
  family: { type: 'string' },
  command: { type: 'string' },
  id: { type: 'string', default: '0' },
  key: { type: 'string' },
  hours: { type: 'string' },
  days: { type: 'string' },
  flags: { type: 'string' },
  test: { type: 'string' },
  action: { type: 'string' },
  'controller-key': { type: 'string' },
  'controller-count': { type: 'string' },
  'accessory-id': { type: 'string' },
  'accessory-key': { type: 'string' },
  'accessory-count': { type: 'string' },
  obscure: { type: 'boolean', default: false },
  verbose: { type: 'boolean', default: false },
  help: { type: 'boolean', default: false },
} as const;

/** String-valued options as parsed from the command line */
export interface CliValues {
  family?: string;
  command?: string;
  id?: string;
  key?: string;
  hours?: string;
  days?: string;
  flags?: string;
  test?: string;
  action?: string;
  'controller-key'?: string;
  'controller-count'?: string;
  'accessory-id'?: string;
  'accessory-key'?: string;
  'accessory-count'?: string;
}

function required(name: string, value: string | undefined): string {
  if (value === undefined) {
    throw new Error(`--${name} is required`);
  }
  return value;
}

function integer(name: string, value: string | undefined): number {
  const text = required(name, value);
  if (!/^\d+$/.test(text)) {
    throw new Error(`--${name} must be a non-negative integer`);
  }
  return Number(text);
}

function oneOf<T extends string>(name: string, value: string | undefined, allowed: readonly T[]): T {
  const text = required(name, value);
  const match = allowed.find((candidate) => candidate === text);
  if (match === undefined) {
    throw new Error(`--${name} must be one of ${allowed.join(', ')}`);
  }
  return match;
}

function accessoryId(value: string | undefined): number {
  const text = required('accessory-id', value);
  if (/^0x[0-9a-f]+$/i.test(text)) {
    return Number.parseInt(text.slice(2), 16);
  }
  return integer('accessory-id', text);
}

function days(value: string | undefined): number | 'unlock' {
  return value === 'unlock' ? 'unlock' : integer('days', value);
}

/**
 * Map parsed options to a message. Throws a plain Error for missing or
 * malformed options, and the library's errors for out-of-range values.
 */
export function buildMessage(values: CliValues): KeycodeMessage {
  const family = oneOf('family', values.family, ['full', 'small'] as const);
  const command = required('command', values.command);
  const id = integer('id', values.id ?? '0');
  const key = (): Uint8Array => hexToBytes(required('key', values.key));
  const controller = () => ({
    controllerKey: hexToBytes(required('controller-key', values['controller-key'])),
    controllerCount: integer('controller-count', values['controller-count']),
  });
  const accessory = () => ({ ...controller(), accessoryId: accessoryId(values['accessory-id']) });

  if (family === 'full') {
    switch (command) {
      case 'add-credit':
        return fullAddCredit(id, integer('hours', values.hours), key());
      case 'set-credit':
        return fullSetCredit(id, integer('hours', values.hours), key());
      case 'unlock':
        return fullUnlock(id, key());
      case 'wipe':
        return fullWipeState(
          id,
          oneOf<FullWipeFlags>('flags', values.flags, ['TARGET_FLAGS_0', 'TARGET_FLAGS_1', 'WIPE_IDS_ALL']),
          key()
        );
      case 'factory':
        return fullFactoryTest(
          oneOf<FullFactoryTest>('test', values.test, ['ALLOW_TEST', 'OQC_TEST', 'DISPLAY_ID'])
        );
      case 'unlink-all-accessories':
        return fullPassthrough(id, unlinkAllAccessories(controller()), key());
      case 'unlock-all-accessories':
        return fullPassthrough(id, unlockAllAccessories(controller()), key());
      case 'unlink-accessory':
        return fullPassthrough(id, unlinkAccessory(accessory()), key());
      case 'unlock-accessory':
        return fullPassthrough(id, unlockAccessory(accessory()), key());
      case 'link-accessory':
        return fullPassthrough(
          id,
          linkAccessoryMode3({
            ...accessory(),
            accessoryKey: hexToBytes(required('accessory-key', values['accessory-key'])),
            accessoryCount: integer('accessory-count', values['accessory-count']),
          }),
          key()
        );
    }
  } else {
    switch (command) {
      case 'add-credit':
        return smallAddCredit(id, days(values.days), key());
      case 'set-credit':
        return smallSetCredit(id, days(values.days), key());
      case 'unlock':
        return smallAddCredit(id, 'unlock', key());
      case 'maintenance':
        return smallMaintenance(
          oneOf<SmallMaintenanceAction>('action', values.action, ['WIPE_STATE_0', 'WIPE_STATE_1', 'WIPE_IDS_ALL']),
          key()
        );
      case 'factory':
        return smallFactoryTest(oneOf<SmallFactoryAction>('action', values.action, ['SHORT_TEST', 'OQC_TEST']));
      case 'wipe-restricted-flag':
        return smallWipeRestrictedFlag(id, key());
      case 'set-credit-wipe-flag':
        return smallSetCreditWipeFlag(id, days(values.days), key());
      case 'unlink-all-accessories':
        return smallPassthrough(id, smallUnlinkAllAccessories(), key());
      case 'unlock-all-accessories':
        return smallPassthrough(id, smallUnlockAllAccessories(), key());
      case 'passthrough-set-credit-wipe-flag':
        return smallPassthrough(id, smallSetCreditWipeRestrictedFlag(days(values.days)), key());
    }
  }
  throw new Error(`Unknown ${family} command: ${command}`);
}
