// A function/label boundary inside a section: a name and the instructions
// that follow it, in source order.
import type { Instruction, RenderOptions } from './instruction';
import { indentLines } from '../utils/text';

export class DisasmSymbol {
  public readonly name: string;
  private readonly instructions: Instruction[] = [];

  constructor(name: string) {
    this.name = name.trim();
  }

  addInstruction(instruction: Instruction): void {
    this.instructions.push(instruction);
  }

  getInstructions(): readonly Instruction[] {
    return this.instructions;
  }

  render(opts: RenderOptions = {}): string {
    const body = this.instructions.map((ins) => ins.render(opts)).join('');
    return `${this.name}:\n${indentLines(body)}`;
  }

  toString(): string {
    return this.render();
  }
}
