#!/usr/bin/env node

/**
 * TOTP CLI Tool
 * Command-line interface for generating and verifying one-time passwords
 */

import { Command, InvalidArgumentError } from 'commander';
import { TotpError } from '../types';
import { flatMap } from '../types/result';
import {
  DEFAULT_SECRET_LENGTH,
  DEFAULT_WINDOW,
  generate,
  generateSecret,
  makeConfig,
  verify,
} from '../services/totp-service';

interface TotpOptions {
  secret: string;
  timeStep?: number;
  t0?: number;
  digits?: number;
  algorithm?: string;
  timestamp?: number;
  json?: boolean;
}

interface VerifyOptions extends TotpOptions {
  code: string;
  window: number;
}

function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return Number(value);
}

function reportError(error: TotpError): void {
  console.error(`❌ ${error.kind}: ${error.message}`);
  process.exitCode = 1;
}

function withTotpOptions(command: Command): Command {
  return command
    .requiredOption('-s, --secret <secret>', 'Base32 encoded secret key')
    .option('--time-step <seconds>', 'time step in seconds (default: 30)', parseInteger)
    .option('--t0 <seconds>', 'Unix time to start counting time steps from (default: 0)', parseInteger)
    .option('-d, --digits <digits>', 'number of digits, 6 to 10 (default: 6)', parseInteger)
    .option('-a, --algorithm <name>', 'sha1, sha256 or sha512 (default: sha1)')
    .option('-t, --timestamp <seconds>', 'Unix timestamp to use instead of the current time', parseInteger)
    .option('--json', 'print machine-readable JSON');
}

function runGenerate(options: TotpOptions): void {
  const config = makeConfig(options);
  const result = flatMap(config, c => generate(c, options.timestamp));
  if (!result.ok) {
    reportError(result.error);
    return;
  }

  const otp = result.value;
  if (options.json) {
    console.log(JSON.stringify(otp));
    return;
  }

  console.log(`OTP:            ${otp.code}`);
  console.log(`Counter:        ${otp.counter}`);
  console.log(`Time remaining: ${otp.timeRemaining}s`);
  console.log(`Timestamp:      ${otp.timestamp}`);
}

function runVerify(options: VerifyOptions): void {
  const result = flatMap(makeConfig(options), c => verify(c, options.code, options.timestamp, options.window));
  if (!result.ok) {
    reportError(result.error);
    return;
  }

  if (options.json) {
    console.log(JSON.stringify({ valid: result.value }));
  } else {
    console.log(result.value ? '✅ VALID' : '❌ INVALID');
  }

  if (!result.value) {
    process.exitCode = 1;
  }
}

function runSecret(options: { length: number }): void {
  const result = generateSecret(options.length);
  if (!result.ok) {
    reportError(result.error);
    return;
  }
  console.log(result.value);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('totp')
    .description('Generate and verify RFC 6238 time-based one-time passwords')
    .version('1.0.0');

  withTotpOptions(program.command('generate'))
    .description('Generate the code for the current time step')
    .action(runGenerate);

  withTotpOptions(program.command('verify'))
    .description('Verify a code against the current time step and its neighbours')
    .requiredOption('-c, --code <code>', 'one-time password to check')
    .option('-w, --window <steps>', 'time steps accepted on either side', parseInteger, DEFAULT_WINDOW)
    .action(runVerify);

  program
    .command('secret')
    .description('Generate a random Base32 secret')
    .option('-l, --length <bytes>', 'secret length in bytes, 16 to 64', parseInteger, DEFAULT_SECRET_LENGTH)
    .action(runSecret);

  return program;
}

if (require.main === module) {
  createProgram().parseAsync(process.argv).catch((error: unknown) => {
    console.error('❌ Command failed:', error);
    process.exit(1);
  });
}
