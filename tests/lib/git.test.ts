import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { execFileSync, spawnSync } from 'child_process';
import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { gitCommand } from '../../src/lib/git';
import { runCommand } from '../../src/lib/process';

const hasGit = spawnSync('git', ['--version']).status === 0;

describe('runCommand', () => {
  it('should report a missing executable as exit code 127', async () => {
    const result = await runCommand('gwt-test-no-such-command', []);
    expect(result.exitCode).toBe(127);
    expect(result.stderr).toContain('Failed to execute gwt-test-no-such-command');
  });
});

describe.skipIf(!hasGit)('gitCommand', () => {
  let testRepo: string;

  beforeEach(() => {
    testRepo = mkdtempSync(join(tmpdir(), 'gwt-git-test-'));
    execFileSync('git', ['init', '-q', '-b', 'main'], { cwd: testRepo });
    execFileSync('git', ['config', 'user.email', 'test@example.com'], { cwd: testRepo });
    execFileSync('git', ['config', 'user.name', 'Test User'], { cwd: testRepo });
  });

  afterEach(() => {
    rmSync(testRepo, { recursive: true, force: true });
  });

  it('should execute git commands successfully', async () => {
    const result = await gitCommand(['rev-parse', '--is-inside-work-tree'], { cwd: testRepo });
    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe('true');
  });

  it('should capture stderr on failure', async () => {
    const result = await gitCommand(['merge', 'nonexistent-branch'], { cwd: testRepo });
    expect(result.exitCode).not.toBe(0);
    expect(result.stderr.length).toBeGreaterThan(0);
  });

  it('should serialize concurrent git operations', async () => {
    const results: string[] = [];

    const operation1 = gitCommand(['status'], { cwd: testRepo }).then((r) => {
      results.push('op1');
      return r;
    });
    const operation2 = gitCommand(['status'], { cwd: testRepo }).then((r) => {
      results.push('op2');
      return r;
    });

    const [r1, r2] = await Promise.all([operation1, operation2]);

    expect(r1.exitCode).toBe(0);
    expect(r2.exitCode).toBe(0);
    expect(results).toEqual(['op1', 'op2']);
  });
});
