import { listMessageDefinitions } from './registry.js';
import type { MessageType } from './types.js';

export type CollisionRule =
  | {
      readonly kind: 'reserved-pattern';
      readonly type: MessageType;
      readonly rival: MessageType;
      readonly values: Readonly<Record<string, number>>;
    }
  | {
      readonly kind: 'discriminator';
      readonly type: MessageType;
      readonly rival: MessageType;
      readonly discriminatorWidth: number;
    };

/**
 * Build the collision table from registry data: declared reserved
 * patterns, plus every other member of a type's digest overload group.
 */
export function deriveCollisionRules(): CollisionRule[] {
  const definitions = listMessageDefinitions();
  const rules: CollisionRule[] = [];

  for (const definition of definitions) {
    for (const pattern of definition.reserved ?? []) {
      rules.push({
        kind: 'reserved-pattern',
        type: definition.type,
        rival: pattern.rival,
        values: pattern.values,
      });
    }

    const overload = definition.overload;
    if (!overload) continue;
    for (const other of definitions) {
      if (other.type === definition.type || other.overload?.group !== overload.group) continue;
      rules.push({
        kind: 'discriminator',
        type: definition.type,
        rival: other.type,
        discriminatorWidth: overload.discriminatorWidth,
      });
    }
  }

  return rules;
}

const RULES_BY_TYPE = new Map<MessageType, CollisionRule[]>();
for (const rule of deriveCollisionRules()) {
  const existing = RULES_BY_TYPE.get(rule.type);
  if (existing) existing.push(rule);
  else RULES_BY_TYPE.set(rule.type, [rule]);
}

export function getCollisionRules(type: MessageType): readonly CollisionRule[] {
  return RULES_BY_TYPE.get(type) ?? [];
}
