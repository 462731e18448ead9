import { describe, it } from 'node:test';
import { expect } from 'expect';
import { inspectTarget, parseArgs, parseTargetExpr, runCli } from '../src/cli.js';

const capture = () => {
  const lines: string[] = [];
  return { lines, write: (line: string) => lines.push(line) };
};

describe('CLI', () => {
  describe('parseArgs', () => {
    it('should split the command, its arguments and options', () => {
      expect(parseArgs(['inspect', 'keys(tags)', '--columns', 'id, tags', '-v'])).toEqual({
        command: 'inspect',
        args: ['keys(tags)'],
        columns: ['id', 'tags'],
        verbose: true,
        help: false,
      });
    });

    it('should recognise help', () => {
      expect(parseArgs(['-h']).help).toBe(true);
    });
  });

  describe('parseTargetExpr', () => {
    it('should read single and composite targets', () => {
      expect(parseTargetExpr('email')).toEqual({ kind: 'single', column: 'email' });
      expect(parseTargetExpr('id,region')).toEqual({ kind: 'multiple', columns: ['id', 'region'] });
      expect(parseTargetExpr('id,')).toEqual({ kind: 'multiple', columns: ['id'] });
    });

    it('should reject an empty expression', () => {
      expect(() => parseTargetExpr(',')).toThrow('Invalid target expression: ","');
    });
  });

  describe('inspectTarget', () => {
    it('should describe a local target', () => {
      expect(inspectTarget('{"pk":["id","region"],"ck":["email"]}')).toEqual([
        'target:  {"pk":["id","region"],"ck":["email"]}',
        'mode:    values',
        'pk:      id, region',
        'ck:      email',
        'local:   true',
        'primary: email',
      ]);
    });

    it('should describe a functional target', () => {
      expect(inspectTarget('entries(attributes)')).toEqual([
        'target:  entries(attributes)',
        'mode:    entries',
        'pk:      attributes',
        'ck:      ',
        'local:   false',
        'primary: entries(attributes)',
      ]);
    });

    it('should resolve against a column list', () => {
      expect(() => inspectTarget('missing', ['id', 'email'])).toThrow('Column missing not found');
    });
  });

  describe('runCli', () => {
    it('should print a serialized target', () => {
      const out = capture();

      expect(runCli(['serialize', 'id,region', 'email'], out.write)).toBe(0);
      expect(out.lines).toEqual(['{"pk":["id","region"],"ck":["email"]}']);
    });

    it('should print a bare target for one column', () => {
      const out = capture();

      expect(runCli(['serialize', 'email'], out.write)).toBe(0);
      expect(out.lines).toEqual(['email']);
    });

    it('should inspect a target', () => {
      const out = capture();

      expect(runCli(['inspect', 'email', '-c', 'email'], out.write)).toBe(0);
      expect(out.lines[1]).toBe('mode:    values');
      expect(out.lines[2]).toBe('pk:      email');
    });

    it('should report errors with exit code 1', () => {
      const out = capture();
      const err = capture();

      expect(runCli(['inspect', '{"pk":"id"}'], out.write, err.write)).toBe(1);
      expect(err.lines).toEqual(['Error: pk and ck fields of JSON definition must be arrays']);
      expect(out.lines).toEqual([]);
    });

    it('should reject a missing target', () => {
      const err = capture();

      expect(runCli(['inspect'], () => {}, err.write)).toBe(1);
      expect(err.lines).toEqual(['Error: inspect requires a target']);
    });

    it('should reject unknown commands', () => {
      const err = capture();

      expect(runCli(['explain', 'x'], () => {}, err.write)).toBe(1);
      expect(err.lines).toEqual(['Unknown command: explain']);
    });

    it('should print help', () => {
      const out = capture();

      expect(runCli(['--help'], out.write)).toBe(0);
      expect(out.lines[0]).toBe('index-target');
    });

    it('should print help and fail without a command', () => {
      const out = capture();

      expect(runCli([], out.write)).toBe(1);
      expect(out.lines).toContain('  index-target serialize <expr>...');
    });
  });
});
