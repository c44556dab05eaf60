/**
 * Index plan applied when the history collection is first opened
 * - { naturalKey: 1, observedAt: -1 } serves per-product history reads, newest first
 */
export const mongoIndexes = {
  priceHistory: [{ keys: { naturalKey: 1, observedAt: -1 }, options: { name: 'naturalKey_observedAt' } }],
} as const;
