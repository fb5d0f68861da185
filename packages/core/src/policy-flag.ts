/**
 * Policy flag parsing
 *
 * Policy switches arrive as text from every source. The parse is total:
 * "true" and "false" map to themselves, everything else to `unparseable`,
 * which enforces nothing. Callers log the unparseable case.
 */

export type PolicyFlag = 'true' | 'false' | 'unparseable';

export function parsePolicyFlag(raw: string): PolicyFlag {
  switch (raw) {
    case 'true':
      return 'true';
    case 'false':
      return 'false';
    default:
      return 'unparseable';
  }
}

export function isFlagEnabled(flag: PolicyFlag): boolean {
  return flag === 'true';
}
