// Parser and canonical renderer for `objdump -d --no-addresses --no-show-raw-insn`
// output. The listing is folded into sections -> symbols -> instructions in a
// single pass, sorted by name and rendered back as indented text, so two
// builds of the same code produce the same listing regardless of addresses,
// raw bytes or link order.
//
// Expected input:
//
//   prog.o:     file format elf64-x86-64
//
//   Disassembly of section .text:
//
//   <main>:
//   	push   %rbp
//   	mov    %rsp,%rbp
//
import { parseInstructionLine } from './instruction';
import type { Instruction, RenderOptions } from './instruction';
import { DisasmSymbol } from './symbol';
import { Section } from './section';
import { DisasmError, isDisasmError } from './errors';
import { compareNames, isBlank } from '../utils/text';
import { silentLogger } from '../utils/log';
import type { Logger } from '../utils/log';

const RE_SECTION = /^Disassembly of section ([A-Za-z0-9.]+):$/;
const RE_SYMBOL = /^<.*>:$/;
const FILE_FORMAT_PREFIX = 'file format ';

export interface ParseOptions {
  log?: Logger;
}

export interface DisassemblyStats {
  sections: number;
  symbols: number;
  instructions: number;
}

interface NumberedLine {
  text: string;
  lineNumber: number;
}

export class Disassembly {
  private sections: Section[];

  constructor(
    public readonly fileName: string,
    public readonly fileFormat: string,
    sections: Section[] = [],
  ) {
    this.sections = sections;
  }

  static parse(input: string | readonly string[], opts: ParseOptions = {}): Disassembly {
    const lines = typeof input === 'string' ? input.split(/\r?\n/) : input;
    return Disassembly.fromLines(lines, opts);
  }

  static fromLines(lines: Iterable<string>, opts: ParseOptions = {}): Disassembly {
    const log = opts.log ?? silentLogger;

    const body: NumberedLine[] = [];
    let n = 0;
    for (const text of lines) {
      n++;
      if (!isBlank(text)) body.push({ text, lineNumber: n });
    }
    const first = body.shift();
    if (!first) throw DisasmError.emptyInput();

    const disasm = Disassembly.fromHeader(first.text, first.lineNumber);
    log.info('PARSE', `file=${disasm.fileName} format=${disasm.fileFormat}`);

    for (const ln of body) {
      try {
        disasm.processLine(ln.text, log, ln.lineNumber);
      } catch (e) {
        if (isDisasmError(e)) throw e.at(ln.text, ln.lineNumber);
        throw e;
      }
    }

    disasm.sort();
    const s = disasm.stats();
    log.info('PARSE', `done: ${s.sections} sections, ${s.symbols} symbols, ${s.instructions} instructions`);
    return disasm;
  }

  // "<file name>: file format <format>". The file name is kept verbatim, it is
  // everything before the first colon.
  private static fromHeader(line: string, lineNumber: number): Disassembly {
    const colon = line.indexOf(':');
    if (colon < 0) throw DisasmError.malformedHeader(line, lineNumber);
    const rest = line.slice(colon + 1).trim();
    if (!rest.startsWith(FILE_FORMAT_PREFIX)) throw DisasmError.malformedHeader(line, lineNumber);
    return new Disassembly(line.slice(0, colon), rest.slice(FILE_FORMAT_PREFIX.length).trim());
  }

  // Precedence: section marker, symbol marker, instruction.
  private processLine(line: string, log: Logger, lineNumber: number): void {
    const t = line.trim();

    const sec = t.match(RE_SECTION);
    if (sec) {
      log.trace('PARSE', `${lineNumber}: section ${sec[1]}`);
      this.addSection(new Section(sec[1]));
      return;
    }

    if (RE_SYMBOL.test(t)) {
      log.trace('PARSE', `${lineNumber}: symbol ${t.slice(0, -1)}`);
      this.addSymbol(new DisasmSymbol(t.slice(0, -1)));
      return;
    }
    // Looks like a symbol marker but has text around it; never an instruction.
    if (t.endsWith('>:')) throw DisasmError.unrecognizedLine(line, lineNumber);

    const ins = parseInstructionLine(line);
    if (!ins) throw DisasmError.unrecognizedLine(line, lineNumber);
    this.addInstruction(ins);
  }

  private currentSection(): Section | undefined {
    return this.sections[this.sections.length - 1];
  }

  private addSection(section: Section): void {
    this.sections.push(section);
  }

  private addSymbol(symbol: DisasmSymbol): void {
    const sec = this.currentSection();
    if (!sec) throw DisasmError.missingSection('symbol');
    sec.addSymbol(symbol);
  }

  private addInstruction(instruction: Instruction): void {
    const sec = this.currentSection();
    if (!sec) throw DisasmError.missingSection('instruction');
    sec.addInstruction(instruction);
  }

  getSections(): readonly Section[] {
    return this.sections;
  }

  // Symbols within each section first, then the sections. Both sorts are
  // stable, so running this again leaves the tree unchanged.
  sort(): void {
    for (const sec of this.sections) sec.sortSymbols();
    this.sections.sort((a, b) => compareNames(a.name, b.name));
  }

  stats(): DisassemblyStats {
    let symbols = 0;
    let instructions = 0;
    for (const sec of this.sections) {
      symbols += sec.getSymbols().length;
      for (const sym of sec.getSymbols()) instructions += sym.getInstructions().length;
    }
    return { sections: this.sections.length, symbols, instructions };
  }

  render(opts: RenderOptions = {}): string {
    return this.sections.map((sec) => sec.render(opts)).join('');
  }

  toString(): string {
    return this.render();
  }
}
