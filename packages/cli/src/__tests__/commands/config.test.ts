import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { createProgram } from '../../program.js';
import { captureConsole, ExitCalled, stubExit, type ConsoleCapture } from '../helpers/console.js';
import { useTempWorkspace, type TempWorkspace } from '../helpers/env.js';

async function runCli(args: string[]): Promise<void> {
  const program = createProgram((p) => {
    p.exitOverride();
    p.configureOutput({ writeOut: () => {}, writeErr: () => {} });
  });
  await program.parseAsync(args, { from: 'user' });
}

describe('config command', () => {
  let output: ConsoleCapture;
  let workspace: TempWorkspace;

  beforeEach(() => {
    output = captureConsole();
    workspace = useTempWorkspace();
    stubExit();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    workspace.cleanup();
  });

  test('should show resolved settings by default', async () => {
    await runCli(['config', '--json']);

    expect(JSON.parse(output.stdout[0] ?? '')).toEqual({
      configPath: null,
      config: {},
      settings: {
        apiUrl: 'https://discord.com/api/v9',
        delaySeconds: 2.5,
        maxRetries: 3,
        timeoutMs: 10_000,
        outputDir: workspace.cwd,
      },
    });
  });

  test('should show a bad GIFTCHECK_DELAY as unset in JSON', async () => {
    process.env.GIFTCHECK_DELAY = 'later';

    await runCli(['config', '--json']);

    expect(JSON.parse(output.stdout[0] ?? '')).toMatchObject({ settings: { delaySeconds: null, maxRetries: 3 } });
  });

  test('should warn about a bad GIFTCHECK_DELAY and keep listing', async () => {
    process.env.GIFTCHECK_DELAY = 'later';

    await runCli(['config']);

    expect(output.stdout[0]).toBe(
      '⚠ Invalid config in GIFTCHECK_DELAY: expected a number of seconds between 0 and 60'
    );
    expect(output.stdout).toContain('  Batch Delay: (invalid)');
    expect(output.stdout).toContain('  Max Retries: 3');
  });

  test('should set a value in the global config', async () => {
    await runCli(['config', 'set', 'delaySeconds', '4']);

    const globalPath = path.join(workspace.xdg, 'giftcheck', 'config.json');
    expect(JSON.parse(fs.readFileSync(globalPath, 'utf-8'))).toEqual({ delaySeconds: 4 });
    expect(output.stdout).toEqual([`✓ Set delaySeconds in ${globalPath}`]);
  });

  test('should set a value in the repo-local config', async () => {
    await runCli(['config', 'set', 'maxRetries', '5', '--local', '--json']);

    const localPath = path.join(workspace.cwd, '.giftcheck', 'config.json');
    expect(JSON.parse(output.stdout[0] ?? '')).toEqual({ key: 'maxRetries', value: '5', configPath: localPath });
    expect(JSON.parse(fs.readFileSync(localPath, 'utf-8'))).toEqual({ maxRetries: 5 });
  });

  test('should reject an unknown key', async () => {
    await expect(runCli(['config', 'set', 'token', 'test-secret'])).rejects.toThrow(ExitCalled);

    expect(output.stderr[0]).toBe('✗ Unknown config key "token"');
    expect(output.stdout[0]).toBe('ℹ Valid keys: apiUrl, delaySeconds, maxRetries, timeoutMs, outputDir');
  });

  test('should report an invalid value with a hint', async () => {
    await expect(runCli(['config', 'set', 'maxRetries', '99'])).rejects.toThrow(ExitCalled);

    const globalPath = path.join(workspace.xdg, 'giftcheck', 'config.json');
    expect(output.stderr[0]).toBe(
      `✗ Invalid config in ${globalPath}: maxRetries: Number must be less than or equal to 10`
    );
    expect(output.stdout).toContain('ℹ Fix the value or run "giftcheck config set <key> <value>".');
    expect(fs.existsSync(globalPath)).toBe(false);
  });
});
