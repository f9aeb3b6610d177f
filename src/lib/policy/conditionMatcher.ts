import { listMatches } from './globMatch.js';
import type { Condition, EvalContext } from './models.js';

type PlainField = Exclude<keyof Condition, 'mcp_servers'>;

/** Condition list -> context field it constrains. */
const FIELD_MAP: ReadonlyArray<readonly [PlainField, keyof EvalContext]> = [
  ['modes', 'mode'],
  ['models', 'model'],
  ['channels', 'channel'],
  ['tools', 'tool'],
  ['risk', 'risk'],
  ['users', 'user'],
  ['sessions', 'session'],
];

/**
 * AND across fields, OR within each field's pattern list.
 *
 * `mcp_servers` is stricter than the other fields: a present pattern list
 * never matches a context without a server, whatever the patterns say.
 */
export function conditionMatches(condition: Condition | undefined, ctx: EvalContext): boolean {
  if (!condition) return true;

  for (const [field, contextField] of FIELD_MAP) {
    if (!listMatches(condition[field], ctx[contextField] ?? '')) return false;
  }

  if (condition.mcp_servers !== undefined) {
    if (!ctx.mcp_server) return false;
    if (!listMatches(condition.mcp_servers, ctx.mcp_server)) return false;
  }

  return true;
}
