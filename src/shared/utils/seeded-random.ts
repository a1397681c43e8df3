/**
 * Deterministic xorshift generator returning values in [0, 1)
 */
export type RandomSource = () => number;

export function createSeededRandom(seedInput: string | number): RandomSource {
  const text = String(seedInput);
  let seed = 0;
  for (let i = 0; i < text.length; i++) seed = (seed << 5) - seed + text.charCodeAt(i);
  if (seed === 0) seed = 0x9e3779b9; // xorshift is stuck at zero
  return () => {
    seed ^= seed << 13;
    seed ^= seed >> 17;
    seed ^= seed << 5;
    return Math.abs(seed % 1000000) / 1000000;
  };
}
