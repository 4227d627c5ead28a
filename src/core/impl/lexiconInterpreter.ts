import type { InterpretationTable, Interpreter } from "../interpreter.js";
import type { FrequencyTable, Interpretation } from "../types.js";

export class LexiconInterpreter implements Interpreter {
  constructor(private readonly table: InterpretationTable) {}

  interpret(frequencies: FrequencyTable): Interpretation[] {
    const out: Interpretation[] = [];
    for (const [term, count] of frequencies) {
      const meaning = this.table.get(term);
      if (meaning !== undefined) out.push({ term, count, meaning });
    }
    return out;
  }
}
