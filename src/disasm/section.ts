// A binary section (".text", ".plt", ...) holding the symbols found in it.
import type { Instruction, RenderOptions } from './instruction';
import { DisasmSymbol } from './symbol';
import { DisasmError } from './errors';
import { compareNames, indentLines } from '../utils/text';

export class Section {
  public readonly name: string;
  private symbols: DisasmSymbol[] = [];

  constructor(name: string) {
    this.name = name.trim();
  }

  addSymbol(symbol: DisasmSymbol): void {
    this.symbols.push(symbol);
  }

  // The open symbol is always the last one added.
  currentSymbol(): DisasmSymbol | undefined {
    return this.symbols[this.symbols.length - 1];
  }

  addInstruction(instruction: Instruction): void {
    const sym = this.currentSymbol();
    if (!sym) throw DisasmError.missingSymbol();
    sym.addInstruction(instruction);
  }

  getSymbols(): readonly DisasmSymbol[] {
    return this.symbols;
  }

  // Array.prototype.sort is stable, so duplicate names keep source order.
  sortSymbols(): void {
    this.symbols.sort((a, b) => compareNames(a.name, b.name));
  }

  render(opts: RenderOptions = {}): string {
    const body = this.symbols.map((sym) => sym.render(opts)).join('');
    return `${this.name}:\n${indentLines(body)}`;
  }

  toString(): string {
    return this.render();
  }
}
