#!/usr/bin/env node
/**
 * toolbridge entry point.
 *
 * Loads `.env`, builds the application context, starts the configured tool
 * servers and answers questions, either once (`--ask`) or interactively.
 *
 * Run: npx tsx src/main.ts
 */

// Load environment
import { config } from 'dotenv';
config();

import * as readline from 'node:readline/promises';
import { stdin, stdout } from 'node:process';

import { VERSION, c, helpText, parseArgs, parseQueryValues, type CLIArgs } from './cli.js';
import { Settings } from './config/settings.js';
import { loadToolServerConfigs } from './config/tool-servers.js';
import { createAppContext, type AppContext } from './context.js';
import type { EngineEvent } from './engine/conversation-engine.js';
import { formatError } from './errors/index.js';
import type { ToolClientEvent } from './mcp/process-tool-client.js';
import { formatToolListing, listServerTools, toolListingToJson } from './mcp/tool-listing.js';
import { formatSpans } from './observability/tracer.js';
import type { PromptLoader } from './prompts/prompt-loader.js';
import { withAgentSession, type AgentSession } from './session/agent-session.js';
import { createCancellationTokenSource, type CancellationTokenSource } from './utilities/cancellation.js';
import { ConsoleSink, FileSink, configureLogger, parseLogLevel, type LogSink } from './utilities/logger.js';

// =============================================================================
// EVENT DISPLAY
// =============================================================================

function printEngineEvent(event: EngineEvent): void {
  switch (event.type) {
    case 'state.changed':
      console.error(c(`  [${event.iteration}] ${event.from} -> ${event.to}`, 'dim'));
      break;
    case 'tool.start':
      console.error(c(`  tool ${event.call.name} ${JSON.stringify(event.call.arguments)}`, 'cyan'));
      break;
    case 'tool.result':
      console.error(c(`  tool ${event.call.name} ${event.isError ? 'failed' : 'done'} (${event.content.length} chars)`, 'dim'));
      break;
    case 'turn.error':
      console.error(c(`  ${event.error.kind}: ${event.error.message}`, 'red'));
      break;
    case 'model.reply':
      break;
  }
}

function printToolEvent(event: ToolClientEvent): void {
  if (event.type === 'server.ready') {
    console.error(c(`  ${event.server}: ${event.toolCount} tools (pid ${event.pid ?? '?'})`, 'dim'));
  } else if (event.type === 'server.exited') {
    console.error(c(`  ${event.server} exited (code ${event.code}, signal ${event.signal})`, 'dim'));
  }
}

// =============================================================================
// QUERIES
// =============================================================================

function printQueries(prompts: PromptLoader): void {
  for (const name of prompts.listQueries()) {
    console.log(`  ${c(name, 'cyan')}  ${prompts.getQueryTemplate(name)}`);
  }
}

/**
 * Question text for a named template, or undefined after reporting why not.
 */
function fillQuery(prompts: PromptLoader, name: string, words: readonly string[]): string | undefined {
  const parsed = parseQueryValues(words);
  if (parsed.errors.length > 0) {
    for (const error of parsed.errors) console.error(c(error, 'red'));
    return undefined;
  }
  try {
    return prompts.formatQuery(name, parsed.values);
  } catch (err) {
    console.error(c(formatError(err), 'red'));
    return undefined;
  }
}

// =============================================================================
// INTERACTIVE LOOP
// =============================================================================

async function interactive(session: AgentSession, context: AppContext, debug: boolean): Promise<number> {
  const rl = readline.createInterface({ input: stdin, output: stdout });
  let current: CancellationTokenSource | null = null;

  rl.on('SIGINT', () => {
    if (current) {
      current.cancel('Interrupted');
    } else {
      rl.close();
    }
  });

  const answer = async (question: string): Promise<void> => {
    const turn = createCancellationTokenSource();
    current = turn;
    const result = await session.ask(question, { token: turn.token }).finally(() => {
      turn.dispose();
      current = null;
    });

    console.log(result.ok ? result.answer : c(result.answer, 'red'));
    if (debug) {
      const messageId = session.lastMessageId;
      const spans = messageId ? context.tracer.getMessageSpans(session.traceId, messageId) : [];
      if (spans.length > 0) console.error(c(formatSpans(spans), 'dim'));
    }
  };

  console.log(`${c('toolbridge', 'bold')} ${VERSION}  model ${c(session.model, 'cyan')}  tools ${session.catalog.size}`);
  console.log(c('Type a question, /help for commands, /exit to quit.', 'dim'));
  rl.setPrompt(c('> ', 'green'));
  rl.prompt();

  for await (const raw of rl) {
    const line = raw.trim();

    if (line === '') {
      rl.prompt();
      continue;
    }
    if (line === '/exit' || line === 'exit' || line === 'quit') break;

    if (line === '/help') {
      console.log(helpText(context.prompts.getExampleQueries(), context.prompts.listQueries()));
    } else if (line === '/tools') {
      for (const tool of session.catalog.definitions()) {
        console.log(`  ${c(tool.name, 'cyan')}  ${tool.description}`);
      }
    } else if (line === '/clear') {
      session.clearHistory();
      console.log(c('Conversation cleared.', 'dim'));
    } else if (line.startsWith('/model')) {
      const next = line.slice('/model'.length).trim();
      try {
        if (next) session.setModel(next);
        console.log(`Model: ${c(session.model, 'cyan')}`);
      } catch (err) {
        console.error(c(formatError(err), 'red'));
      }
    } else if (line.startsWith('/query')) {
      const words = line.slice('/query'.length).trim().split(/\s+/).filter((w) => w !== '');
      const [name, ...rest] = words;
      if (name === undefined) {
        printQueries(context.prompts);
      } else {
        const question = fillQuery(context.prompts, name, rest);
        if (question !== undefined) {
          console.log(c(question, 'dim'));
          await answer(question);
        }
      }
    } else {
      await answer(line);
    }

    rl.prompt();
  }

  rl.close();
  return 0;
}

// =============================================================================
// TOOL LISTING
// =============================================================================

async function listTools(context: AppContext, settings: Settings, args: CLIArgs): Promise<number> {
  const listing = createCancellationTokenSource();
  const onSigint = (): void => listing.cancel('Interrupted');
  process.once('SIGINT', onSigint);

  try {
    const servers = loadToolServerConfigs(context.runtime.TOOL_SERVERS_CONFIG, settings);
    const listings = await listServerTools(servers, {
      server: args.listServer,
      requestTimeoutMs: context.runtime.TOOL_REQUEST_TIMEOUT_MS,
      shutdownGraceMs: context.runtime.TOOL_SHUTDOWN_GRACE_MS,
      logger: context.logger,
      token: listing.token,
    });
    console.log(
      args.json
        ? JSON.stringify(toolListingToJson(listings, args.detailed), null, 2)
        : formatToolListing(listings, args.detailed)
    );
    return 0;
  } catch (err) {
    console.error(c(formatError(err), 'red'));
    return 1;
  } finally {
    process.removeListener('SIGINT', onSigint);
    listing.dispose();
  }
}

// =============================================================================
// MAIN
// =============================================================================

function buildSettings(args: CLIArgs): Settings {
  return Settings.fromEnv().with({
    MODEL_NAME: args.model,
    TOOL_SERVERS_CONFIG: args.servers,
    AGENT_MAX_ITERATIONS: args.maxIterations?.toString(),
    LOG_LEVEL: args.debug ? 'debug' : undefined,
  });
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));

  if (args.errors.length > 0) {
    for (const error of args.errors) console.error(c(error, 'red'));
    console.error('Run with --help for usage.');
    return 2;
  }
  if (args.version) {
    console.log(VERSION);
    return 0;
  }

  const settings = buildSettings(args);
  const logFile = settings.get('LOG_FILE');
  const sinks: LogSink[] = [new ConsoleSink()];
  if (logFile) sinks.push(new FileSink(logFile));
  configureLogger({ level: parseLogLevel(settings.get('LOG_LEVEL'), 'warn'), sinks });

  let context: AppContext;
  try {
    context = createAppContext({ settings });
  } catch (err) {
    console.error(c(formatError(err), 'red'));
    return 1;
  }

  if (args.help) {
    console.log(helpText(context.prompts.getExampleQueries(), context.prompts.listQueries()));
    context.dispose();
    return 0;
  }

  if (args.listTools) {
    try {
      return await listTools(context, settings, args);
    } finally {
      context.dispose();
    }
  }

  let question = args.ask;
  if (args.query) {
    try {
      question = context.prompts.formatQuery(args.query.name, args.query.values);
    } catch (err) {
      console.error(c(formatError(err), 'red'));
      context.dispose();
      return 1;
    }
  }

  const startup = createCancellationTokenSource();
  const onSigint = (): void => startup.cancel('Interrupted during startup');
  process.once('SIGINT', onSigint);

  try {
    const servers = loadToolServerConfigs(context.runtime.TOOL_SERVERS_CONFIG, settings);
    return await withAgentSession(
      {
        context,
        servers,
        onEngineEvent: args.debug ? printEngineEvent : undefined,
        onToolEvent: args.debug ? printToolEvent : undefined,
      },
      async (session) => {
        process.removeListener('SIGINT', onSigint);

        if (question !== undefined) {
          const turn = createCancellationTokenSource();
          const onTurnSigint = (): void => turn.cancel('Interrupted');
          process.once('SIGINT', onTurnSigint);
          try {
            const result = await session.ask(question, { token: turn.token });
            if (result.ok) {
              console.log(result.answer);
              return 0;
            }
            console.error(c(result.answer, 'red'));
            return 1;
          } finally {
            process.removeListener('SIGINT', onTurnSigint);
            turn.dispose();
          }
        }

        return interactive(session, context, args.debug);
      },
      startup.token
    );
  } catch (err) {
    console.error(c(formatError(err), 'red'));
    return 1;
  } finally {
    process.removeListener('SIGINT', onSigint);
    startup.dispose();
    context.dispose();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(c(`Fatal: ${formatError(err)}`, 'red'));
    process.exitCode = 1;
  }
);
