/**
 * Documentation for one exported word.
 */
export interface WordDoc {
  name: string;
  /** e.g. "( a:number b:number -- sum:number )" */
  stackEffect: string;
  description: string;
}

/**
 * One line of a module listing.
 */
export interface ModuleSummary {
  name: string;
  description: string;
  /** Number of exported words */
  wordCount: number;
  /** False for vocabulary every runtime shares (core) */
  runtimeSpecific: boolean;
}

/**
 * Full description of a module's exported surface.
 */
export interface ModuleDescription {
  name: string;
  description: string;
  words: WordDoc[];
}
