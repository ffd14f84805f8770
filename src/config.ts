// Environment-driven defaults. Command-line flags override these.
import type { RenderOptions } from './disasm/instruction';
import type { LogSettings } from './utils/log';

export type Env = Record<string, string | undefined>;

export interface Config extends LogSettings {
  render: Required<RenderOptions>;
  objdump: string;
}

function flag(v: string | undefined): boolean {
  if (v === undefined) return false;
  const t = v.trim().toLowerCase();
  return t === '1' || t === 'true';
}

export function loadConfig(env: Env = process.env): Config {
  let logLimit = 200;
  const lim = Number(env.DISASM_LOG_LIMIT ?? '200');
  if (Number.isFinite(lim) && lim >= 1 && lim <= 1000000) logLimit = lim | 0;

  const objdump = (env.DISASM_OBJDUMP ?? '').trim();

  return {
    render: {
      includeOperands: flag(env.DISASM_INCLUDE_OPERANDS),
      includeComments: flag(env.DISASM_INCLUDE_COMMENTS),
    },
    objdump: objdump.length > 0 ? objdump : 'objdump',
    log: flag(env.DISASM_LOG),
    logLimit,
  };
}
