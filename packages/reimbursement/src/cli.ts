#!/usr/bin/env node
// Invoice reimbursement: operator CLI
//
// Usage:
//   reimburse analyze --employee "Jane Doe" --policy policy.txt inv1.txt inv2.txt
//   reimburse chat "Which of Jane's invoices were declined?"
//   reimburse chat --status declined --from 2024-01-01 "travel expenses"
//   reimburse chat -i                                   # interactive REPL
//   reimburse stats [--json]
//   reimburse --help

import 'dotenv/config';
import { createInterface } from 'node:readline';
import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { configFromEnv } from '../config/index.js';
import { createReimbursementSystem, type ReimbursementSystem } from '../service/reimbursement-system.js';
import type { ChatResponse, RetrievalFilters } from '../types/retrieval.js';
import { errorMessage } from '../errors.js';
import { CliUsageError, parseCliArgs, type CliCommand } from './cli-args.js';

// ── ANSI helpers (no chalk dependency) ──────────────────────────────

const isTTY = process.stdout.isTTY ?? false;

const ansi = {
  reset: isTTY ? '\x1b[0m' : '',
  bold: isTTY ? '\x1b[1m' : '',
  dim: isTTY ? '\x1b[2m' : '',
  cyan: isTTY ? '\x1b[36m' : '',
  green: isTTY ? '\x1b[32m' : '',
  yellow: isTTY ? '\x1b[33m' : '',
  red: isTTY ? '\x1b[31m' : '',
};

function c(color: keyof typeof ansi, text: string): string {
  return `${ansi[color]}${text}${ansi.reset}`;
}

// ── CLI class ───────────────────────────────────────────────────────

class ReimburseCli {
  async start(argv: string[]): Promise<number> {
    let command: CliCommand;
    try {
      command = parseCliArgs(argv);
    } catch (err) {
      if (!(err instanceof CliUsageError)) throw err;
      console.error(`  ${c('red', 'Error:')} ${err.message}\n`);
      this.printHelp();
      return 1;
    }

    if (command.kind === 'help') {
      if (command.topic === 'analyze') this.printAnalyzeHelp();
      else if (command.topic === 'chat') this.printChatHelp();
      else this.printHelp();
      return 0;
    }

    const system = await createReimbursementSystem(configFromEnv());
    system.start();
    try {
      switch (command.kind) {
        case 'analyze':
          return await this.handleAnalyze(system, command);
        case 'chat':
          if (command.interactive) {
            await this.startRepl(system, command.filters, command.sessionId);
            return 0;
          }
          return await this.handleChat(system, command.query, command.filters, command.sessionId);
        case 'stats':
          this.printStats(system, command.json);
          return 0;
      }
    } finally {
      await system.shutdown();
    }
  }

  // ── Subcommand: analyze ─────────────────────────────────────────

  private async handleAnalyze(
    system: ReimbursementSystem,
    command: Extract<CliCommand, { kind: 'analyze' }>,
  ): Promise<number> {
    if (!system.llm) {
      console.error(`  ${c('red', 'Error:')} ANTHROPIC_API_KEY environment variable is required to analyze invoices.\n`);
      return 1;
    }

    const policyText = await readFile(command.policyPath, 'utf-8');
    const invoices = await Promise.all(command.invoicePaths.map(async (path) => ({
      filename: basename(path),
      text: await readFile(path, 'utf-8'),
    })));

    console.log(`\n  ${c('bold', 'Invoice Analysis')} ${c('dim', `— ${command.employeeName}, ${invoices.length} invoice(s)`)}\n`);

    const result = await system.analyzer.analyze(command.employeeName, policyText, invoices, {
      concurrency: command.concurrency,
      onProgress: (p) => {
        if (p.status === 'running') return;
        const mark = p.status === 'completed' ? c('green', '✓') : c('red', '✗');
        process.stderr.write(`  ${mark} ${p.current} ${c('dim', `(${p.completed}/${p.total})`)}\n`);
      },
    });

    console.log(`\n${result.summary}`);
    console.log(`  ${c('dim', `Completed in ${(result.totalDurationMs / 1000).toFixed(1)}s`)}\n`);
    return result.failed > 0 && result.processed === 0 ? 1 : 0;
  }

  // ── Subcommand: chat ────────────────────────────────────────────

  private async handleChat(
    system: ReimbursementSystem,
    query: string,
    filters: RetrievalFilters,
    sessionId?: string,
  ): Promise<number> {
    const reply = await system.chat.chat({ queryText: query, sessionId, filters });
    this.printReply(reply);
    return 0;
  }

  private printReply(reply: ChatResponse): void {
    console.log(`\n${reply.response}\n`);
    if (reply.sources.length > 0) {
      console.log(`  ${c('bold', 'Sources:')}`);
      for (const s of reply.sources) {
        console.log(`    ${c('cyan', s.employeeName)} ${s.invoiceFilename} ${c('dim', `${s.reimbursementStatus} · ${s.similarityScore.toFixed(3)}`)}`);
      }
    }
    console.log(`  ${c('dim', `Session: ${reply.sessionId}`)}\n`);
  }

  // ── Interactive REPL ────────────────────────────────────────────

  private async startRepl(system: ReimbursementSystem, filters: RetrievalFilters, initialSession?: string): Promise<void> {
    let sessionId = initialSession;

    console.log(`\n  ${c('bold', 'Invoice Reimbursement Assistant')}`);
    console.log(`  ${c('dim', `Indexed analyses: ${system.index.count()} | Model: ${system.llm?.model ?? 'none (degraded answers)'}`)}`);
    console.log(`  ${c('dim', 'Ask a question, or /help for commands.')}\n`);

    const rl = createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: `${c('cyan', 'reimburse>')} `,
    });
    rl.on('SIGINT', () => rl.close());

    rl.prompt();
    for await (const line of rl) {
      const input = line.trim();

      if (input === 'exit' || input === 'quit') break;

      if (input === '/help') {
        this.printReplHelp();
      } else if (input === '/reset') {
        if (sessionId) system.conversations.resetSession(sessionId);
        sessionId = undefined;
        console.log(`  ${c('green', '✓')} Conversation cleared\n`);
      } else if (input === '/stats') {
        this.printStats(system, false);
      } else if (input !== '') {
        try {
          const reply = await system.chat.chat({ queryText: input, sessionId, filters });
          sessionId = reply.sessionId;
          this.printReply(reply);
        } catch (err) {
          console.error(`  ${c('red', 'Error:')} ${errorMessage(err)}\n`);
        }
      }
      rl.prompt();
    }

    rl.close();
    console.log(`  ${c('dim', 'Goodbye.')}\n`);
  }

  // ── Subcommand: stats ───────────────────────────────────────────

  private printStats(system: ReimbursementSystem, json: boolean): void {
    const stats = system.index.statistics();
    const health = system.health();
    if (json) {
      console.log(JSON.stringify({ ...stats, sessions: system.conversations.stats(), embeddingModel: health.embeddingModel }, null, 2));
      return;
    }

    console.log(`\n  ${c('bold', `${stats.totalAnalyses} analyzed invoices`)} ${c('dim', `(${stats.employees.length} employees)`)}\n`);
    for (const [status, count] of Object.entries(stats.statusDistribution)) {
      console.log(`    ${status.padEnd(22, ' ')} ${count}`);
    }
    console.log(`\n    ${'Total reimbursed'.padEnd(22, ' ')} ${stats.totalReimbursed.toFixed(2)}`);
    console.log(`    ${'Average reimbursement'.padEnd(22, ' ')} ${stats.averageReimbursement.toFixed(2)}`);
    console.log(`    ${'Active sessions'.padEnd(22, ' ')} ${health.activeSessions}\n`);
  }

  // ── Help screens ────────────────────────────────────────────────

  printHelp(): void {
    console.log(`
  ${c('bold', 'reimburse')} — invoice reimbursement analysis and retrieval

  ${c('bold', 'Usage:')}
    reimburse analyze --employee <name> --policy <file> <invoice...>   Analyze text invoices
    reimburse chat "<question>"                                       Ask about analyzed invoices
    reimburse chat -i                                                 Start interactive REPL
    reimburse stats [--json]                                          Show index statistics
    reimburse --help                                                  Show this help

  ${c('bold', 'Environment:')}
    ANTHROPIC_API_KEY, VECTOR_DB_PATH, EMBEDDING_BACKEND, OPENAI_API_KEY, LOG_LEVEL
`);
  }

  private printAnalyzeHelp(): void {
    console.log(`
  ${c('bold', 'reimburse analyze')} — Analyze invoices against a reimbursement policy

  ${c('bold', 'Options:')}
    -e, --employee <name>     Employee the invoices belong to (required)
    -p, --policy <file>       Policy text file (required)
    --concurrency <n>         Parallel analyses (default: ANALYSIS_CONCURRENCY or 3)
`);
  }

  private printChatHelp(): void {
    console.log(`
  ${c('bold', 'reimburse chat')} — Ask questions about analyzed invoices

  ${c('bold', 'Options:')}
    -i, --interactive         Start interactive REPL mode
    --session <id>            Continue an existing conversation
    -e, --employee <name>     Only invoices of this employee
    --status <status>         fully | partially | declined (repeatable)
    --from <YYYY-MM-DD>       Invoices dated on or after
    --to <YYYY-MM-DD>         Invoices dated on or before
`);
  }

  private printReplHelp(): void {
    console.log(`
  ${c('bold', 'REPL commands:')}
    /help              Show this help
    /reset             Start a new conversation
    /stats             Show index statistics
    exit               Exit REPL
`);
  }
}

// ── Entry point ─────────────────────────────────────────────────────

const cli = new ReimburseCli();
cli.start(process.argv.slice(2)).then(
  (code) => { process.exitCode = code; },
  (err: unknown) => {
    console.error(`${c('red', 'Fatal:')} ${errorMessage(err)}`);
    process.exit(1);
  },
);
