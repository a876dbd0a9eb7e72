import { defaultRandom, pickIndex, type RandomSource } from "./random";

export const FALLBACK_ENCOURAGEMENTS = [
  "That's a great answer! Thank you for sharing.",
  "Excellent! I appreciate the detailed response.",
  "Wonderful! Your experience really shows.",
  "Perfect! That's exactly what we wanted to hear.",
] as const;

export function getFallbackEncouragement(
  random: RandomSource = defaultRandom,
  previousLine?: string,
): string {
  const previous = previousLine?.trim();
  const candidates = FALLBACK_ENCOURAGEMENTS.filter((line) => line !== previous);
  if (candidates.length === 0) {
    return FALLBACK_ENCOURAGEMENTS[0];
  }
  return candidates[pickIndex(random, candidates.length)];
}
