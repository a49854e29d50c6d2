import type { CutRule } from "../config/registry.js";
import type { FastaRecord } from "./fasta.js";

/** Prefix marking decoy proteins; the Kojak templates filter on the same token. */
export const DECOY_PREFIX = "decoy_";

/**
 * Seed of every decoy database. It is deliberately not configurable: score
 * calibration downstream assumes the same decoys for the same targets.
 */
export const DECOY_SEED = 1;

const STOP_RESIDUE = "*";

/** mulberry32: small, fast 32-bit generator returning floats in [0, 1). */
export function createSeededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4_294_967_296;
  };
}

/**
 * Cleavage sites of `sequence`, as indices `i` such that the bond between
 * residues `i - 1` and `i` is cut.
 */
export function findCleavageSites(sequence: string, rule: CutRule): number[] {
  const sites: number[] = [];
  for (let index = 1; index < sequence.length; index += 1) {
    if (rule.after.includes(sequence[index - 1]) || rule.before.includes(sequence[index])) {
      sites.push(index);
    }
  }
  return sites;
}

/**
 * Shuffles every enzymatic peptide of `sequence` in place of the original,
 * keeping cleavage residues where they are so the decoy digests into peptides
 * of the same lengths and termini as the target. A trailing stop `*` stays last.
 */
export function shuffleSequence(sequence: string, rule: CutRule, random: () => number): string {
  const residues = [...sequence];
  const boundaries = [0, ...findCleavageSites(sequence, rule), sequence.length];

  for (let peptide = 0; peptide < boundaries.length - 1; peptide += 1) {
    const start = boundaries[peptide];
    const end = boundaries[peptide + 1];
    const movable: number[] = [];
    for (let index = start; index < end; index += 1) {
      const pinnedAfter = index === end - 1 && rule.after.includes(residues[index]);
      const pinnedBefore = index === start && rule.before.includes(residues[index]);
      const stop = residues[index] === STOP_RESIDUE;
      if (!pinnedAfter && !pinnedBefore && !stop) {
        movable.push(index);
      }
    }

    // Fisher-Yates over the movable positions only.
    for (let i = movable.length - 1; i > 0; i -= 1) {
      const j = Math.floor(random() * (i + 1));
      const a = movable[i];
      const b = movable[j];
      [residues[a], residues[b]] = [residues[b], residues[a]];
    }
  }

  return residues.join("");
}

/**
 * One decoy per target, in target order. A single generator stream spans the
 * whole database, so the output depends on the targets, the rule and the seed
 * only.
 */
export function makeDecoys(targets: readonly FastaRecord[], rule: CutRule, seed: number = DECOY_SEED): FastaRecord[] {
  const random = createSeededRandom(seed);
  return targets.map((target) => ({
    header: `${DECOY_PREFIX}${target.header}`,
    sequence: shuffleSequence(target.sequence, rule, random),
  }));
}
