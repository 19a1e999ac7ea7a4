#!/usr/bin/env node
import 'dotenv/config';

import { resolveConfig } from './config/loader.js';
import { CitewiseError } from './errors.js';
import { createLanguageModel } from './llm/factory.js';
import { streamingIfAllowed } from './llm/streaming.js';
import { createDebugSink, createLogger } from './logging/logger.js';
import { loadChatHistory, loadDocuments } from './documents/loader.js';
import { formatAnswer, formatExtracts } from './output/terminal.js';
import { listProviders } from './providers/router.js';
import { getVerbatimExtracts, relevantExtracts } from './rag/extracts.js';
import { getSummaryAnswer } from './rag/summary.js';
import { followupToStandalone } from './rag/standalone.js';

const USAGE = `
citewise - Verbatim extracts and cited answers from your documents

Usage:
  citewise ask <prompt>                                 Single model call
  citewise extract <question> --docs <dir>              Verbatim extracts per document
  citewise answer <question> --docs <dir>               Cited answer from documents
  citewise standalone <question> --history <file.yaml>  Rewrite a follow-up question
  citewise mcp                                          Start MCP server (stdio)

Options:
  --provider <type>  Provider: ${listProviders().join(', ')} (default: openai)
  --model <model>    Chat model id
  --debug            Log prompts and responses to stderr
  --no-cache         Bypass the response cache
  --no-stream        Never stream output
  --help, -h         Show this help message

Config is read from ~/.citewise/config.yaml and ./.citewise/config.yaml.
`.trim();

const BOOLEAN_FLAGS = new Set(['debug', 'no-cache', 'no-stream', 'help']);

function parseArgs(args: string[]): { command: string; positional: string; flags: Record<string, string> } {
  const command = args[0] ?? 'help';
  const flags: Record<string, string> = {};
  const positional: string[] = [];

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const next = args[i + 1];
      if (!BOOLEAN_FLAGS.has(key) && next !== undefined && !next.startsWith('--')) {
        flags[key] = next;
        i++;
      } else {
        flags[key] = 'true';
      }
    } else if (arg === '-h') {
      flags['help'] = 'true';
    } else {
      positional.push(arg);
    }
  }

  return { command, positional: positional.join(' '), flags };
}

function buildRuntime(flags: Record<string, string>) {
  const llm: Record<string, unknown> = {};
  if (flags['provider']) llm.type = flags['provider'];
  if (flags['model']) llm.chatModel = flags['model'];
  if (flags['no-cache']) llm.cache = { type: 'none' };

  const settings: Record<string, unknown> = {};
  if (flags['debug']) settings.debug = true;
  if (flags['no-stream']) settings.stream = false;

  const resolved = resolveConfig({ llm, settings });
  const logger = createLogger({
    level: resolved.settings.debug ? 'debug' : 'warn',
    pretty: resolved.settings.debug,
  });
  const model = createLanguageModel(resolved.llm, { logger });
  return { model, settings: resolved.settings, debug: createDebugSink(resolved.settings, logger) };
}

function requireArg(value: string | undefined, usage: string): string {
  if (!value) {
    console.error(`Error: ${usage}`);
    process.exit(1);
  }
  return value;
}

async function main(): Promise<void> {
  const { command, positional, flags } = parseArgs(process.argv.slice(2));

  if (flags['help'] || command === 'help' || command === '--help' || command === '-h') {
    console.log(USAGE);
    return;
  }

  switch (command) {
    case 'ask': {
      const prompt = requireArg(positional, 'prompt is required. Usage: citewise ask "your prompt"');
      const { model, settings } = buildRuntime(flags);
      await streamingIfAllowed(model, settings.stream, async () => {
        const streamed = model.getStream();
        const response = await model.generate(prompt);
        if (streamed) {
          process.stdout.write('\n');
        } else {
          console.log(response.message);
        }
      });
      break;
    }

    case 'extract': {
      const question = requireArg(positional, 'question is required. Usage: citewise extract "question" --docs <dir>');
      const dir = requireArg(flags['docs'], '--docs <dir> is required');
      const { model, debug } = buildRuntime(flags);
      const passages = await loadDocuments(dir);
      const extracts = await getVerbatimExtracts(model, question, passages, debug);
      console.log(formatExtracts(extracts));
      break;
    }

    case 'answer': {
      const question = requireArg(positional, 'question is required. Usage: citewise answer "question" --docs <dir>');
      const dir = requireArg(flags['docs'], '--docs <dir> is required');
      const { model, debug } = buildRuntime(flags);
      const passages = await loadDocuments(dir);
      const extracts = await getVerbatimExtracts(model, question, passages, debug);
      const relevant = relevantExtracts(extracts);
      if (relevant.length === 0) {
        console.log('No relevant passages found.');
        break;
      }
      const answer = await getSummaryAnswer(model, question, relevant, debug);
      console.log(formatAnswer(answer));
      break;
    }

    case 'standalone': {
      const question = requireArg(positional, 'question is required. Usage: citewise standalone "question" --history <file>');
      const file = requireArg(flags['history'], '--history <file.yaml> is required');
      const { model, debug } = buildRuntime(flags);
      const history = await loadChatHistory(file);
      console.log(await followupToStandalone(model, history, question, debug));
      break;
    }

    case 'mcp': {
      await import('./mcp.js');
      break;
    }

    default:
      console.error(`Unknown command: ${command}`);
      console.log(USAGE);
      process.exit(1);
  }
}

main().catch((err: unknown) => {
  if (err instanceof CitewiseError) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error('Fatal error:', err);
  }
  process.exit(1);
});
