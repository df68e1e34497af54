import { type WmregConfig, WmregError } from '@wmreg/shared';
import { ConfigManager, RegisterBank } from '@wmreg/core';

export interface Setup {
  config: WmregConfig;
  bank: RegisterBank;
}

export async function setupBank(configPath?: string): Promise<Setup> {
  const config = await new ConfigManager().load({ configPath });
  return { config, bank: new RegisterBank(config.registers) };
}

/** Prints known failures and sets a non-zero exit code; rethrows anything else. */
export function handleError(err: unknown): void {
  if (err instanceof WmregError) {
    console.error(err.message);
    process.exitCode = 1;
    return;
  }
  throw err;
}
