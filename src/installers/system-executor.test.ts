import { ChildProcessExecutor, describeFailure } from './system-executor';

describe('ChildProcessExecutor', () => {
  let executor: ChildProcessExecutor;

  beforeEach(() => {
    executor = new ChildProcessExecutor(false);
  });

  describe('run', () => {
    it('should capture stdout and a zero exit code', async () => {
      const result = await executor.run('sh', ['-c', 'echo ready']);

      expect(result).toEqual({ stdout: 'ready\n', stderr: '', exitCode: 0 });
    });

    it('should report the exit code and stderr of a failing command', async () => {
      const result = await executor.run('sh', ['-c', 'echo "no such unit" >&2; exit 3']);

      expect(result.exitCode).toBe(3);
      expect(result.stderr).toBe('no such unit\n');
    });

    it('should pipe input to the command', async () => {
      const result = await executor.run('cat', [], { input: '[Unit]\nDescription=test\n' });

      expect(result.stdout).toBe('[Unit]\nDescription=test\n');
      expect(result.exitCode).toBe(0);
    });

    it('should map a command that cannot be spawned to exit 127', async () => {
      const result = await executor.run('tuxagent-missing-command', ['--version']);

      expect(result.exitCode).toBe(127);
      expect(result.stdout).toBe('');
      expect(result.stderr).toContain('ENOENT');
    });

    it('should echo each command in debug mode', async () => {
      await new ChildProcessExecutor(true).run('sh', ['-c', 'exit 0']);

      expect(console.log).toHaveBeenCalledWith('$ sh -c exit 0');
    });

    it('should stay quiet outside debug mode', async () => {
      await executor.run('sh', ['-c', 'exit 0']);

      expect(console.log).not.toHaveBeenCalled();
    });
  });

  describe('commandExists', () => {
    it('should find a command on PATH', async () => {
      expect(await executor.commandExists('sh')).toBe(true);
    });

    it('should report a missing command', async () => {
      expect(await executor.commandExists('tuxagent-missing-command')).toBe(false);
    });
  });
});

describe('describeFailure', () => {
  it('should include the last stderr line', () => {
    expect(describeFailure({ stdout: '', stderr: 'warning\nE: Unable to locate package\n', exitCode: 100 })).toBe(
      'exit 100: E: Unable to locate package'
    );
  });

  it('should fall back to the exit code alone', () => {
    expect(describeFailure({ stdout: 'partial', stderr: '  \n', exitCode: 1 })).toBe('exit 1');
  });
});
