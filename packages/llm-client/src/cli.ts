#!/usr/bin/env node
import fs from 'node:fs';

import dotenv from 'dotenv';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { isTerminalEvent, type NormalizedEvent } from '@streamnorm/shared';
import { isModelFamily, MODEL_FAMILIES, type ModelFamily } from '@streamnorm/stream-core';

import { loadEnvConfig } from './envConfig';
import { isLlmClientError } from './errors';
import { LlmHandler } from './llmHandler';
import { createConsoleLogger } from './logger';
import { replayJsonLines } from './replay';
import { processOutputSink, renderEvent } from './terminalOutput';

function toModelFamily(value: string | undefined): ModelFamily | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isModelFamily(value)) {
    throw new Error(`Unknown adapter "${value}". Expected one of: ${MODEL_FAMILIES.join(', ')}`);
  }
  return value;
}

function printEvent(event: NormalizedEvent, json: boolean): void {
  if (json) {
    console.log(JSON.stringify(event));
    return;
  }
  renderEvent(event, processOutputSink);
}

function failedFatally(events: NormalizedEvent[]): boolean {
  return events.some((event) => isTerminalEvent(event) && event.type === 'error');
}

async function main(): Promise<void> {
  dotenv.config();
  const env = loadEnvConfig();
  const logger = createConsoleLogger({ debug: env.debug });

  await yargs(hideBin(process.argv))
    .scriptName('streamnorm')
    .usage('Usage: $0 <command> [options]')
    .command(
      'replay <file>',
      'Normalize recorded provider output (one JSON object per line) and print the events.',
      (command) =>
        command
          .positional('file', {
            type: 'string',
            describe: 'Path to the recording.',
            demandOption: true,
          })
          .option('model', {
            type: 'string',
            describe: 'Model name used to pick the adapter.',
          })
          .option('adapter', {
            type: 'string',
            choices: MODEL_FAMILIES,
            describe: 'Adapter family; overrides the model name.',
          })
          .option('response', {
            type: 'boolean',
            default: false,
            describe: 'The file holds one non-streaming response.',
          })
          .option('keep-thinking', {
            type: 'boolean',
            default: env.keepThinking,
            describe: 'Emit thinking_delta events.',
          })
          .option('partial-strings', {
            type: 'boolean',
            default: false,
            describe: 'Show unterminated strings in tool_call_delta arguments.',
          })
          .option('json', {
            type: 'boolean',
            default: true,
            describe: 'Print events as JSON lines.',
          }),
      (argv) => {
        const lines = fs.readFileSync(argv.file, 'utf8').split(/\r?\n/);
        const adapter = toModelFamily(argv.adapter);
        const events = replayJsonLines(lines, {
          mode: argv.response ? 'response' : 'stream',
          ...(argv.model ? { model: argv.model } : {}),
          ...(adapter ? { adapter } : {}),
          keepThinking: argv['keep-thinking'],
          partialToolArguments: argv['partial-strings'],
          logger,
        });
        for (const event of events) {
          printEvent(event, argv.json);
        }
        if (failedFatally(events)) {
          process.exitCode = 1;
        }
      },
    )
    .command(
      'chat <prompt>',
      'Send one user message to a configured model and stream the answer.',
      (command) =>
        command
          .positional('prompt', {
            type: 'string',
            describe: 'User message.',
            demandOption: true,
          })
          .option('model', {
            type: 'string',
            describe: 'Call name of the configured model.',
          })
          .option('thinking', {
            type: 'boolean',
            default: false,
            describe: 'Ask the model to think first (where the model supports a toggle).',
          })
          .option('keep-thinking', {
            type: 'boolean',
            default: env.keepThinking,
            describe: 'Show thinking text.',
          })
          .option('json', {
            type: 'boolean',
            default: false,
            describe: 'Print events as JSON lines.',
          }),
      async (argv) => {
        const handler = LlmHandler.fromFile(env.configPath, { logger });
        const events: NormalizedEvent[] = [];
        for await (const event of handler.stream([{ role: 'user', content: argv.prompt }], {
          ...(argv.model ? { model: argv.model } : {}),
          enableThinking: argv.thinking,
          keepThinking: argv['keep-thinking'],
        })) {
          events.push(event);
          printEvent(event, argv.json);
        }
        if (failedFatally(events)) {
          process.exitCode = 1;
        }
      },
    )
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync();
}

main().catch((err: unknown) => {
  if (isLlmClientError(err)) {
    console.error(`Error (${err.code}): ${err.message}`);
  } else {
    console.error(err instanceof Error ? err.message : String(err));
  }
  process.exitCode = 1;
});
