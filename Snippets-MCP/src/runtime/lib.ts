/**
 * Helpers exposed to snippets as `lib`.
 */
export const lib = {
  /** Random integer between min and max, both inclusive. */
  random: (min: number, max: number): number => Math.floor(Math.random() * (max - min + 1)) + min,
};
