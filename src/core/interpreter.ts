import type { FrequencyTable, Interpretation, Term } from "./types.js";

/** Static term -> meaning lookup data. */
export type InterpretationTable = ReadonlyMap<Term, string>;

export interface Interpreter {
  /** Returns an entry for each table term that occurs, in frequency-table order. */
  interpret(frequencies: FrequencyTable): Interpretation[];
}
