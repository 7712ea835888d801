// Canonical replay output

import type { ProjectionReplayResult } from '@ledgerline/protocol';
import { stringifyCanonical } from '@ledgerline/protocol';

/**
 * Serialize with sorted keys, so byte-identical logs give byte-identical output.
 */
export function serializeReplayResult(result: ProjectionReplayResult, indent?: number): string {
  return stringifyCanonical(result, indent);
}
