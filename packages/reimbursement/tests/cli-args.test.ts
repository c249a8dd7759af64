import { describe, it, expect } from 'vitest';
import { CliUsageError, parseCliArgs } from '../src/cli-args.js';

describe('parseCliArgs', () => {
  it('shows help without arguments', () => {
    expect(parseCliArgs([])).toEqual({ kind: 'help' });
    expect(parseCliArgs(['--help'])).toEqual({ kind: 'help' });
    expect(parseCliArgs(['analyze', '--help'])).toEqual({ kind: 'help', topic: 'analyze' });
  });

  it('parses an analyze run', () => {
    expect(parseCliArgs(['analyze', '-e', ' Jane Doe ', '-p', 'policy.txt', 'a.txt', 'b.txt', '--concurrency', '2']))
      .toEqual({
        kind: 'analyze',
        employeeName: 'Jane Doe',
        policyPath: 'policy.txt',
        invoicePaths: ['a.txt', 'b.txt'],
        concurrency: 2,
      });
  });

  it('requires the analyze inputs', () => {
    expect(() => parseCliArgs(['analyze', '-p', 'policy.txt', 'a.txt'])).toThrow('analyze requires --employee <name>');
    expect(() => parseCliArgs(['analyze', '-e', 'Jane', '-p', 'policy.txt'])).toThrow('analyze requires at least one invoice file');
    expect(() => parseCliArgs(['analyze', '-e', 'Jane', '--concurrency', '0']))
      .toThrow('--concurrency must be a positive integer, got "0"');
  });

  it('parses chat filters and joins the query words', () => {
    expect(parseCliArgs([
      'chat', '--status', 'declined', '--status', 'partially', '--from', '2024-01-01', 'travel', 'expenses',
    ])).toEqual({
      kind: 'chat',
      interactive: false,
      query: 'travel expenses',
      sessionId: undefined,
      filters: {
        reimbursementStatus: ['Declined', 'Partially Reimbursed'],
        dateRange: { from: '2024-01-01' },
      },
    });
  });

  it('keeps a single status as a scalar filter', () => {
    const command = parseCliArgs(['chat', '--session', 'abc', '-e', 'Bob', '--status', 'fully', 'hi']);
    expect(command).toEqual({
      kind: 'chat',
      interactive: false,
      query: 'hi',
      sessionId: 'abc',
      filters: { employeeName: 'Bob', reimbursementStatus: 'Fully Reimbursed' },
    });
  });

  it('allows an interactive chat without a query', () => {
    expect(parseCliArgs(['chat', '-i'])).toMatchObject({ kind: 'chat', interactive: true, query: '' });
  });

  it('reports usage errors', () => {
    expect(() => parseCliArgs(['chat'])).toThrow(CliUsageError);
    expect(() => parseCliArgs(['chat', '--status', 'maybe', 'x'])).toThrow('Unknown status "maybe". Valid: fully, partially, declined');
    expect(() => parseCliArgs(['chat', '--employee', '--status', 'declined'])).toThrow('--employee requires a value');
    expect(() => parseCliArgs(['chat', '--department', 'x'])).toThrow('Unknown option for chat: --department');
    expect(() => parseCliArgs(['frobnicate'])).toThrow('Unknown command: frobnicate');
  });

  it('parses stats', () => {
    expect(parseCliArgs(['stats', '--json'])).toEqual({ kind: 'stats', json: true });
    expect(parseCliArgs(['stats'])).toEqual({ kind: 'stats', json: false });
  });
});
