// One disassembled line, reduced to mnemonic, operands and trailing comment.
// Input is objdump output produced with --no-addresses --no-show-raw-insn, so a
// line looks like:
//   \tmov    -0x8(%rbp),%rax
//   \tbnd jmp <_init+0x20>
//   \tcall   *0x2fe2(%rip)        # 3fd8 <__libc_start_main@GLIBC_2.34>

export interface RenderOptions {
  includeOperands?: boolean;
  includeComments?: boolean;
}

// Lowercase letters and digits, words separated by whitespace (prefixed
// mnemonics such as "rep stos" or "data16 cs nopw").
const RE_OPCODE = /^[a-z0-9]+(?:\s+[a-z0-9]+)*$/;
// Everything up to the last whitespace run, then a single operand token.
const RE_OPCODE_OPERANDS = /^(.*\S)\s+(\S+)$/;

export class Instruction {
  constructor(
    public readonly opcode: string,
    public readonly operands: string = '',
    public readonly comment: string = '',
  ) {}

  render(opts: RenderOptions = {}): string {
    let out = this.opcode;
    if (opts.includeOperands && this.operands.length > 0) out += ` ${this.operands}`;
    if (opts.includeComments && this.comment.length > 0) out += ` # ${this.comment}`;
    return `${out}\n`;
  }

  toString(): string {
    return this.render();
  }
}

// Returns null when the line is not an instruction line: no leading
// whitespace, nothing before the comment, or an opcode with characters
// outside [a-z0-9] and interior whitespace.
export function parseInstructionLine(line: string): Instruction | null {
  if (!/^\s/.test(line)) return null;

  const hash = line.indexOf('#');
  const left = hash >= 0 ? line.slice(0, hash) : line;
  const comment = hash >= 0 ? line.slice(hash + 1).trim() : '';

  const body = left.trim();
  if (body.length === 0) return null;

  // A one-token line, or a mnemonic whose every word is opcode-shaped
  // ("bnd jmp" carries no operands).
  if (RE_OPCODE.test(body)) return new Instruction(body, '', comment);

  const m = body.match(RE_OPCODE_OPERANDS);
  if (!m || !RE_OPCODE.test(m[1])) return null;
  return new Instruction(m[1], m[2], comment);
}
