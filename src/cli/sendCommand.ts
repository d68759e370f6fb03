#!/usr/bin/env node
import { resolveConfig } from '../config';
import { describeError } from '../errors';
import { sendCommand } from '../services/commands/CommandClient';
import { listCommandNames } from '../services/commands/parseCommand';

const printUsage = (): void => {
  process.stdout.write('Usage: longscribe-send [--wait] <COMMAND> [argument]\n\n');
  process.stdout.write('Commands:\n');
  for (const name of listCommandNames()) {
    process.stdout.write(`  ${name}\n`);
  }
  process.stdout.write('\n--wait  after STOP_AND_TRANSCRIBE, block until the transcript was delivered\n');
};

const main = async (): Promise<number> => {
  const argv = process.argv.slice(2);
  const waitForCompletion = argv.includes('--wait');
  const words = argv.filter((arg) => arg !== '--wait');

  if (words.length === 0 || words[0] === '--help' || words[0] === '-h') {
    printUsage();
    return words.length === 0 ? 1 : 0;
  }

  const config = resolveConfig();
  const line = words.join(' ');
  const result = await sendCommand(line, {
    host: config.host,
    port: config.port,
    waitForCompletion,
    timeoutMs: waitForCompletion ? 0 : 5000
  });

  process.stdout.write(`${JSON.stringify(result.reply)}\n`);
  if (result.completion) {
    process.stdout.write(`${JSON.stringify(result.completion)}\n`);
  }

  return result.reply.ok ? 0 : 1;
};

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`longscribe-send: ${describeError(error)}\n`);
    process.exitCode = 2;
  });
