import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { resolveLayout } from './config';
import { LocalFileOperations } from './installers/file-operations';
import {
  Confirmer,
  ExecOptions,
  ExecResult,
  FileOperationsByDomain,
  InstallLayout,
  SystemExecutor,
} from './installers/types';

// One directory per Jest worker so parallel test files never share state
export const TEST_TEMP_DIR = path.join(os.tmpdir(), `tuxagent-setup-tests-${process.env.JEST_WORKER_ID ?? '0'}`);
export const TEST_HOME_DIR = path.join(TEST_TEMP_DIR, 'home');
export const TEST_PROJECT_DIR = path.join(TEST_TEMP_DIR, 'project');

function removeTestDir(): void {
  let retries = 3;
  while (retries > 0 && fs.existsSync(TEST_TEMP_DIR)) {
    try {
      fs.rmSync(TEST_TEMP_DIR, { recursive: true, force: true });
      break;
    } catch (error) {
      retries--;
    }
  }
}

beforeEach(() => {
  jest.clearAllMocks();
  jest.restoreAllMocks();
  removeTestDir();
  fs.mkdirSync(TEST_HOME_DIR, { recursive: true });

  // Keep installer output out of the test report; tests assert on these spies
  jest.spyOn(console, 'log').mockImplementation(() => {});
  jest.spyOn(console, 'warn').mockImplementation(() => {});
  jest.spyOn(console, 'error').mockImplementation(() => {});
});

afterAll(() => {
  removeTestDir();
});

// Nothing under test may reach the real home directory
jest.mock('os', () => ({
  ...jest.requireActual('os'),
  homedir: () => TEST_HOME_DIR
}));

export interface RecordedCommand {
  line: string;
  input?: string;
}

/**
 * In-process stand-in for the host: records every command line and answers
 * from registered prefixes (most recent registration wins), exit 0 otherwise.
 */
export class FakeExecutor implements SystemExecutor {
  public calls: RecordedCommand[] = [];
  public available = new Set<string>(['python3', 'pip3', 'systemctl', 'sudo']);
  private responses: Array<{ prefix: string; result: ExecResult }> = [];

  constructor() {
    this.respond('python3 -c', { stdout: '3.12\n' });
  }

  respond(prefix: string, result: Partial<ExecResult>): this {
    this.responses.unshift({ prefix, result: { stdout: '', stderr: '', exitCode: 0, ...result } });
    return this;
  }

  async run(command: string, args: readonly string[], options: ExecOptions = {}): Promise<ExecResult> {
    const line = [command, ...args].join(' ');
    this.calls.push({ line, input: options.input });
    const match = this.responses.find(response => line.startsWith(response.prefix));
    return match ? { ...match.result } : { stdout: '', stderr: '', exitCode: 0 };
  }

  async commandExists(name: string): Promise<boolean> {
    return this.available.has(name);
  }

  lines(): string[] {
    return this.calls.map(call => call.line);
  }

  mutatingLines(): string[] {
    return this.lines().filter(line => !line.startsWith('python3 -c') && !line.startsWith('lsb_release'));
  }
}

export class ScriptedConfirmer implements Confirmer {
  public questions: string[] = [];

  constructor(private answers: boolean[]) {}

  async askConfirmation(message: string): Promise<boolean> {
    this.questions.push(message);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error(`Unexpected prompt: ${message}`);
    }
    return answer;
  }
}

export function createTestLayout(): InstallLayout {
  return resolveLayout({
    homeDir: TEST_HOME_DIR,
    projectDir: TEST_PROJECT_DIR,
    env: {
      TUXAGENT_BIN_DIR: path.join(TEST_TEMP_DIR, 'usr', 'local', 'bin'),
      TUXAGENT_INSTALL_DIR: path.join(TEST_TEMP_DIR, 'usr', 'lib', 'tuxagent'),
    },
  });
}

export function createTestFileOps(): FileOperationsByDomain {
  return {
    system: new LocalFileOperations('system'),
    user: new LocalFileOperations('user'),
  };
}

// Minimal copy of the application tree the installer copies from
export function createMockProject(options: { requirements?: boolean; nautilus?: boolean } = {}): void {
  const files: Record<string, string> = {
    'src/cli/tux.py': 'print("tux")\n',
    'src/daemon/main.py': 'print("daemon")\n',
    'src/ui/main.py': 'print("overlay")\n',
    'config/config.py': 'LOG_LEVEL = "INFO"\n',
  };
  if (options.requirements !== false) {
    files['requirements.txt'] = 'httpx\npsutil\n';
  }
  if (options.nautilus !== false) {
    files['extensions/nautilus/tuxagent-extension.py'] = '# nautilus extension\n';
  }

  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(TEST_PROJECT_DIR, relative);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
  }
}

export function writeOsRelease(content: string): string {
  const target = path.join(TEST_TEMP_DIR, 'etc', 'os-release');
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, content);
  return target;
}

/**
 * Relative path -> content for every file under root (directories omitted).
 */
export function snapshotTree(root: string): Record<string, string> {
  const snapshot: Record<string, string> = {};
  if (!fs.existsSync(root)) {
    return snapshot;
  }

  const walk = (dir: string): void => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        walk(full);
      } else {
        snapshot[path.relative(root, full)] = fs.readFileSync(full, 'utf-8');
      }
    }
  };
  walk(root);
  return snapshot;
}

// Everything the installer may write: the fake home and the fake /usr
export function snapshotHost(): Record<string, string> {
  return {
    ...prefixKeys('home', snapshotTree(TEST_HOME_DIR)),
    ...prefixKeys('usr', snapshotTree(path.join(TEST_TEMP_DIR, 'usr'))),
  };
}

function prefixKeys(prefix: string, snapshot: Record<string, string>): Record<string, string> {
  return Object.fromEntries(Object.entries(snapshot).map(([key, value]) => [`${prefix}/${key}`, value]));
}
