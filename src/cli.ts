/**
 * CLI Argument Parsing and Help
 */

// ANSI color codes for terminal output
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
};

export function c(text: string, color: keyof typeof colors): string {
  return `${colors[color]}${text}${colors.reset}`;
}

export const VERSION = '0.1.0';

/**
 * CLI arguments structure.
 */
export interface CLIArgs {
  help: boolean;
  version: boolean;
  debug: boolean;
  model?: string;
  servers?: string;
  maxIterations?: number;
  /** Single-shot question; interactive mode when absent */
  ask?: string;
  /** Named query template plus its placeholder values, answered once */
  query?: { name: string; values: Record<string, string> };
  /** List tools and exit; needs no model settings */
  listTools: boolean;
  /** Restrict --list-tools to one server */
  listServer?: string;
  json: boolean;
  detailed: boolean;
  /** Usage problems, reported before anything starts */
  errors: string[];
}

/**
 * Parse command-line arguments (without the node and script entries).
 */
export function parseArgs(argv: readonly string[]): CLIArgs {
  const result: CLIArgs = {
    help: false,
    version: false,
    debug: false,
    listTools: false,
    json: false,
    detailed: false,
    errors: [],
  };

  const valueOf = (flag: string, i: number): string | undefined => {
    const value = argv[i + 1];
    if (value === undefined || value.startsWith('-')) {
      result.errors.push(`${flag} requires a value`);
      return undefined;
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--version' || arg === '-v') {
      result.version = true;
    } else if (arg === '--debug') {
      result.debug = true;
    } else if (arg === '--model' || arg === '-m') {
      result.model = valueOf(arg, i);
      if (result.model !== undefined) i++;
    } else if (arg === '--servers' || arg === '-s') {
      result.servers = valueOf(arg, i);
      if (result.servers !== undefined) i++;
    } else if (arg === '--max-iterations' || arg === '-i') {
      const raw = valueOf(arg, i);
      if (raw !== undefined) {
        i++;
        const parsed = Number(raw);
        if (Number.isInteger(parsed) && parsed > 0) {
          result.maxIterations = parsed;
        } else {
          result.errors.push(`${arg} must be a positive integer (got "${raw}")`);
        }
      }
    } else if (arg === '--list-tools' || arg === '-l') {
      result.listTools = true;
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith('-')) {
        result.listServer = next;
        i++;
      }
    } else if (arg === '--json') {
      result.json = true;
    } else if (arg === '--detailed') {
      result.detailed = true;
    } else if (arg === '--query' || arg === '-q') {
      const name = valueOf(arg, i);
      if (name !== undefined) {
        const parsed = parseQueryValues(argv.slice(i + 2));
        result.query = { name, values: parsed.values };
        result.errors.push(...parsed.errors);
      }
      break;
    } else if (arg === '--ask' || arg === '-a') {
      const rest = argv.slice(i + 1).join(' ').trim();
      if (rest === '') {
        result.errors.push(`${arg} requires a question`);
      } else {
        result.ask = rest;
      }
      break;
    } else if (arg.startsWith('-')) {
      result.errors.push(`Unknown option: ${arg}`);
    } else {
      result.ask = argv.slice(i).join(' ');
      break;
    }
  }

  return result;
}

/**
 * `key=value` words for a query template. Values keep any later `=`.
 */
export function parseQueryValues(words: readonly string[]): { values: Record<string, string>; errors: string[] } {
  const values: Record<string, string> = {};
  const errors: string[] = [];

  for (const word of words) {
    const match = /^(\w+)=(.*)$/.exec(word);
    if (match && match[1] !== undefined && match[2] !== undefined) {
      values[match[1]] = match[2];
    } else {
      errors.push(`Expected key=value, got "${word}"`);
    }
  }
  return { values, errors };
}

/**
 * Help text.
 */
export function helpText(examples: readonly string[] = [], queries: readonly string[] = []): string {
  const exampleLines = examples.map((q) => `  toolbridge --ask "${q}"`).join('\n');
  const queryLine = queries.length > 0 ? `\n${c('QUERIES:', 'bold')}\n  ${queries.join(', ')}\n` : '';
  return `
${c('TOOLBRIDGE', 'bold')} - ask questions answered through tool servers

${c('USAGE:', 'bold')}
  toolbridge [OPTIONS] [QUESTION]

${c('OPTIONS:', 'bold')}
  -h, --help              Show this help
  -v, --version           Show version (${VERSION})
  -m, --model ID          Model as provider:model (default: MODEL_NAME or azure:gpt-4o)
  -s, --servers FILE      Tool server configuration (default: tool-servers.json)
  -i, --max-iterations N  Model calls allowed per question (default: 25)
  -a, --ask QUESTION      Answer one question and exit
  -q, --query NAME K=V..  Answer a named query template and exit
  -l, --list-tools [NAME] List the tools of every (or one) server and exit
  --json                  With --list-tools: print JSON
  --detailed              With --list-tools: include parameters
  --debug                 Log at debug level and print engine events

${c('INTERACTIVE COMMANDS:', 'bold')}
  /tools                  List discovered tools
  /query NAME K=V..       Ask a named query template
  /model ID               Switch model for later questions
  /clear                  Forget the conversation so far
  /exit                   Quit (also: exit, quit, Ctrl+D)

${c('ENVIRONMENT:', 'bold')}
  AZURE_OPENAI_API_KEY, AZURE_OPENAI_ENDPOINT, AZURE_OPENAI_API_VERSION
  OLLAMA_ENDPOINT
  GITHUB_PERSONAL_ACCESS_TOKEN, GITHUB_HOST
  TOOL_REQUEST_TIMEOUT_MS, TOOL_SHUTDOWN_GRACE_MS, TURN_TIMEOUT_MS
  LOG_LEVEL, LOG_FILE, PROMPTS_FILE
${queryLine}${exampleLines ? `\n${c('EXAMPLES:', 'bold')}\n${exampleLines}\n` : ''}`;
}
