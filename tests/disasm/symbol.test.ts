import { describe, it, expect } from 'vitest';
import { DisasmSymbol } from '../../src/disasm/symbol';
import { Instruction } from '../../src/disasm/instruction';

describe('DisasmSymbol', () => {
  it('accepts an empty name', () => {
    const sym = new DisasmSymbol('');
    expect(sym.name).toBe('');
    expect(sym.getInstructions()).toEqual([]);
  });

  it('trims the name', () => {
    expect(new DisasmSymbol('  <main> ').name).toBe('<main>');
  });

  it('keeps instructions in insertion order', () => {
    const sym = new DisasmSymbol('sym');
    sym.addInstruction(new Instruction('nop'));
    sym.addInstruction(new Instruction('bnd jmp', '<_init+0x20>'));
    expect(sym.getInstructions().map((i) => i.opcode)).toEqual(['nop', 'bnd jmp']);
  });

  it('renders an empty symbol as its header only', () => {
    expect(new DisasmSymbol('').toString()).toBe(':\n');
    expect(new DisasmSymbol('sym').toString()).toBe('sym:\n');
  });

  it('indents instructions by four spaces', () => {
    const sym = new DisasmSymbol('sym');
    sym.addInstruction(new Instruction('nop'));
    sym.addInstruction(new Instruction('bnd jmp', '<_init+0x20>'));
    expect(sym.toString()).toBe('sym:\n    nop\n    bnd jmp\n');
    expect(sym.render({ includeOperands: true })).toBe('sym:\n    nop\n    bnd jmp <_init+0x20>\n');
  });
});
