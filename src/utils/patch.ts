/**
 * Shallow merge of a partial update. Keys absent from the patch keep their
 * stored value; request schemas never emit keys the body did not carry.
 */
export function applyPatch<T extends object>(record: T, patch: Partial<T>): T {
  return { ...record, ...patch };
}
