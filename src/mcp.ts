#!/usr/bin/env node
import 'dotenv/config';

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { resolveConfig } from './config/loader.js';
import { createLanguageModel } from './llm/factory.js';
import { createDebugSink, createLogger } from './logging/logger.js';
import { formatAnswer, formatExtracts } from './output/terminal.js';
import { getVerbatimExtracts, relevantExtracts } from './rag/extracts.js';
import { getSummaryAnswer } from './rag/summary.js';
import type { Document } from './llm/types.js';

// stdout carries the MCP protocol, so the model must never stream to it
const { llm, settings } = resolveConfig({ llm: { stream: false } });
const logger = createLogger({ level: settings.debug ? 'debug' : 'warn' });
const model = createLanguageModel(llm, { logger });
const debug = createDebugSink(settings, logger);

const server = new McpServer({
  name: 'citewise',
  version: '0.1.0',
});

const passagesParam = z
  .array(
    z.object({
      content: z.string().describe('Passage text'),
      source: z.string().describe('Where the passage came from, e.g. a file name or URL'),
    }),
  )
  .min(1)
  .describe('Passages to search');

function toDocuments(passages: { content: string; source: string }[]): Document[] {
  return passages.map((p) => ({ content: p.content, metadata: { source: p.source } }));
}

// --- Tools ---

server.tool(
  'citewise_ask',
  'Single model call with a plain prompt.',
  {
    prompt: z.string().describe('The prompt to send'),
  },
  async ({ prompt }) => {
    const response = await model.generate(prompt);
    return {
      content: [{ type: 'text' as const, text: response.message }],
    };
  },
);

server.tool(
  'citewise_extract',
  'Copy out, verbatim, the parts of each passage that are relevant to a question.',
  {
    question: z.string().describe('The question the extracts should be relevant to'),
    passages: passagesParam,
  },
  async ({ question, passages }) => {
    const extracts = await getVerbatimExtracts(model, question, toDocuments(passages), debug);
    return {
      content: [{ type: 'text' as const, text: formatExtracts(extracts, { color: false }) }],
    };
  },
);

server.tool(
  'citewise_answer',
  'Answer a question from the given passages, citing the sources used.',
  {
    question: z.string().describe('The question to answer'),
    passages: passagesParam,
  },
  async ({ question, passages }) => {
    const docs = toDocuments(passages);
    const extracts = await getVerbatimExtracts(model, question, docs, debug);
    const relevant = relevantExtracts(extracts);
    if (relevant.length === 0) {
      return { content: [{ type: 'text' as const, text: 'No relevant passages found.' }] };
    }
    const answer = await getSummaryAnswer(model, question, relevant, debug);
    return {
      content: [{ type: 'text' as const, text: formatAnswer(answer, { color: false }) }],
    };
  },
);

// --- Start ---

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((err) => {
  logger.fatal({ err }, 'citewise MCP server error');
  process.exit(1);
});
