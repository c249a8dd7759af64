// Argument parsing for the reimburse CLI, kept free of I/O

import { normalizeStatus } from '../llm/verdict.js';
import type { ReimbursementStatus } from '../types/invoice.js';
import type { RetrievalFilters } from '../types/retrieval.js';

export type CliCommand =
  | { kind: 'help'; topic?: 'analyze' | 'chat' }
  | {
      kind: 'analyze';
      employeeName: string;
      policyPath: string;
      invoicePaths: string[];
      concurrency?: number;
    }
  | {
      kind: 'chat';
      interactive: boolean;
      query: string;
      sessionId?: string;
      filters: RetrievalFilters;
    }
  | { kind: 'stats'; json: boolean };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

function takeValue(args: string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return value;
}

function parseAnalyze(args: string[]): CliCommand {
  let employeeName: string | undefined;
  let policyPath: string | undefined;
  let concurrency: number | undefined;
  const invoicePaths: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--help' || arg === '-h') return { kind: 'help', topic: 'analyze' };
    if (arg === '--employee' || arg === '-e') {
      employeeName = takeValue(args, i++, arg).trim();
    } else if (arg === '--policy' || arg === '-p') {
      policyPath = takeValue(args, i++, arg);
    } else if (arg === '--concurrency') {
      const raw = takeValue(args, i++, arg);
      concurrency = Number(raw);
      if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new CliUsageError(`--concurrency must be a positive integer, got "${raw}"`);
      }
    } else if (arg.startsWith('-')) {
      throw new CliUsageError(`Unknown option for analyze: ${arg}`);
    } else {
      invoicePaths.push(arg);
    }
  }

  if (!employeeName) throw new CliUsageError('analyze requires --employee <name>');
  if (!policyPath) throw new CliUsageError('analyze requires --policy <file>');
  if (invoicePaths.length === 0) throw new CliUsageError('analyze requires at least one invoice file');
  return { kind: 'analyze', employeeName, policyPath, invoicePaths, concurrency };
}

function parseChat(args: string[]): CliCommand {
  let interactive = false;
  let sessionId: string | undefined;
  const statuses: ReimbursementStatus[] = [];
  const filters: RetrievalFilters = {};
  const queryParts: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--help' || arg === '-h') return { kind: 'help', topic: 'chat' };
    if (arg === '-i' || arg === '--interactive') {
      interactive = true;
    } else if (arg === '--session') {
      sessionId = takeValue(args, i++, arg);
    } else if (arg === '--employee' || arg === '-e') {
      filters.employeeName = takeValue(args, i++, arg);
    } else if (arg === '--status') {
      const raw = takeValue(args, i++, arg);
      const status = normalizeStatus(raw);
      if (!status) {
        throw new CliUsageError(`Unknown status "${raw}". Valid: fully, partially, declined`);
      }
      if (!statuses.includes(status)) statuses.push(status);
    } else if (arg === '--from') {
      filters.dateRange = { ...filters.dateRange, from: takeValue(args, i++, arg) };
    } else if (arg === '--to') {
      filters.dateRange = { ...filters.dateRange, to: takeValue(args, i++, arg) };
    } else if (arg.startsWith('--')) {
      throw new CliUsageError(`Unknown option for chat: ${arg}`);
    } else {
      queryParts.push(arg);
    }
  }

  if (statuses.length === 1) filters.reimbursementStatus = statuses[0];
  else if (statuses.length > 1) filters.reimbursementStatus = statuses;

  const query = queryParts.join(' ').trim();
  if (!interactive && !query) {
    throw new CliUsageError('No query provided. Use "reimburse chat --help" for usage.');
  }
  return { kind: 'chat', interactive, query, sessionId, filters };
}

/** @throws CliUsageError for unknown commands, options or missing values */
export function parseCliArgs(argv: string[]): CliCommand {
  if (argv.length === 0 || argv[0] === '--help' || argv[0] === '-h' || argv[0] === 'help') {
    return { kind: 'help' };
  }

  const [command, ...rest] = argv;
  switch (command) {
    case 'analyze':
      return parseAnalyze(rest);
    case 'chat':
      return parseChat(rest);
    case 'stats':
      return { kind: 'stats', json: rest.includes('--json') };
    default:
      throw new CliUsageError(`Unknown command: ${command}`);
  }
}
