/**
 * @bytepair/vocab -- immutable vocabularies built from in-memory rank tables.
 */
export { Vocabulary } from "./vocabulary.js";
export { byteLevelTable, byteLevelVocabulary, type ByteLevelOptions } from "./builders.js";
export type { RankTable, TokenEntry, MergeEntry, SpecialEntry } from "./rank-table.js";
