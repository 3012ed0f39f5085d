import { distance } from 'fastest-levenshtein';
import type { SourceCandidate, TrackMetadata } from '../shared/messages';

// versions of a song that are only wanted when the track title asks for them
const UNWANTED_VERSIONS = [
  'live', 'cover', 'karaoke', 'remix', 'instrumental', 'acoustic',
  'sped', 'slowed', 'nightcore', 'reverb', '8d',
];

const COVERAGE_WEIGHT = 0.55;
const SIMILARITY_WEIGHT = 0.15;
const DURATION_WEIGHT = 0.3;
const UNWANTED_VERSION_PENALTY = 0.3;
// within this many seconds a duration counts as an exact match
const DURATION_TOLERANCE = 3;
// past the tolerance, the duration score drops to zero over this many seconds
const DURATION_FALLOFF = 30;

export interface ScoredCandidate {
  candidate: SourceCandidate;
  confidence: number;
}

export const normalize = (s: string) => s
  .normalize('NFKD')
  .replace(/[\u0300-\u036f]/g, '')
  .toLowerCase()
  .replace(/&/g, ' and ')
  .replace(/[^\p{L}\p{N}]+/gu, ' ')
  .trim();

const tokenize = (s: string) => normalize(s).split(' ').filter(Boolean);

export function textSimilarity(a: string, b: string) {
  const x = normalize(a);
  const y = normalize(b);
  const longest = Math.max(x.length, y.length);
  if (longest === 0) return 1;
  return 1 - distance(x, y) / longest;
}

export function durationScore(expectedSeconds: number, actualSeconds: number | null) {
  // unknown on either side: neither evidence for nor against
  if (actualSeconds === null || !expectedSeconds) return 0.5;
  const diff = Math.abs(expectedSeconds - actualSeconds);
  if (diff <= DURATION_TOLERANCE) return 1;
  return Math.max(0, 1 - (diff - DURATION_TOLERANCE) / DURATION_FALLOFF);
}

export function buildSearchQuery(metadata: TrackMetadata) {
  return `${metadata.artist} - ${metadata.title}`;
}

export function scoreCandidate(metadata: TrackMetadata, candidate: SourceCandidate) {
  const expectedTokens = [...new Set(tokenize(`${metadata.artist} ${metadata.title}`))];
  const candidateTokens = new Set(tokenize(`${candidate.uploader ?? ''} ${candidate.title}`));
  const coverage = expectedTokens.length
    ? expectedTokens.filter(token => candidateTokens.has(token)).length / expectedTokens.length
    : 0;

  const similarity = Math.max(
    textSimilarity(candidate.title, buildSearchQuery(metadata)),
    textSimilarity(candidate.title, metadata.title),
  );

  const titleTokens = new Set(tokenize(metadata.title));
  const hasUnwantedVersion = tokenize(candidate.title)
    .some(token => UNWANTED_VERSIONS.includes(token) && !titleTokens.has(token));

  const score = COVERAGE_WEIGHT * coverage
    + SIMILARITY_WEIGHT * similarity
    + DURATION_WEIGHT * durationScore(metadata.durationSeconds, candidate.durationSeconds)
    - (hasUnwantedVersion ? UNWANTED_VERSION_PENALTY : 0);
  return Math.round(Math.min(1, Math.max(0, score)) * 1000) / 1000;
}

/**
 * Candidates sorted by confidence, best first.
 * Equal scores keep the search engine's order.
 */
export function rankCandidates(metadata: TrackMetadata, candidates: SourceCandidate[]): ScoredCandidate[] {
  return candidates
    .map((candidate, index) => ({ candidate, confidence: scoreCandidate(metadata, candidate), index }))
    .sort((a, b) => b.confidence - a.confidence || a.index - b.index)
    .map(({ candidate, confidence }) => ({ candidate, confidence }));
}

export function pickBestCandidate(
  metadata: TrackMetadata,
  candidates: SourceCandidate[],
  minConfidence: number,
): ScoredCandidate | null {
  const [best] = rankCandidates(metadata, candidates);
  if (!best || best.confidence < minConfidence) return null;
  return best;
}
