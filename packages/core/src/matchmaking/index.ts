export { Matchmaker, compareHelpers } from './matchmaker.js';
export type { MatchResult } from './matchmaker.js';
