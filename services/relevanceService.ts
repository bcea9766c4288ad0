import { CandidateGrant, GrantFinderConfig, ScoredGrant } from "../types";
import { ModelClient } from "./modelClient";

const magnitude = (vector: number[]): number =>
  Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));

/**
 * Cosine similarity in [-1, 1]. A zero-magnitude vector (the embedding fallback) scores exactly 0.
 */
export const cosineSimilarity = (left: number[], right: number[]): number => {
  const leftNorm = magnitude(left);
  const rightNorm = magnitude(right);
  if (leftNorm === 0 || rightNorm === 0) return 0;

  if (left.length !== right.length) {
    throw new RangeError(`Cannot compare vectors of length ${left.length} and ${right.length}.`);
  }

  let dot = 0;
  for (let index = 0; index < left.length; index += 1) {
    dot += left[index] * right[index];
  }
  return dot / (leftNorm * rightNorm);
};

const embeddingText = (candidate: CandidateGrant): string =>
  candidate.summary.trim() || candidate.title.trim();

export const rankCandidates = async (
  client: ModelClient,
  candidates: CandidateGrant[],
  mission: string,
  config: Pick<GrantFinderConfig, "num" | "top">
): Promise<ScoredGrant[]> => {
  const pool = candidates.slice(0, config.num);
  if (pool.length === 0) return [];

  const missionVector = await client.embed(mission);

  const scored: ScoredGrant[] = [];
  for (const candidate of pool) {
    const text = embeddingText(candidate);
    const similarity = text ? cosineSimilarity(await client.embed(text), missionVector) : 0;
    scored.push({ ...candidate, similarity });
  }

  // Array.prototype.sort is stable, so equal scores keep generation order.
  return scored.sort((left, right) => right.similarity - left.similarity).slice(0, config.top);
};
