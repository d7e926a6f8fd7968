import * as fs from 'fs';
import * as path from 'path';
import { LocalFileOperations, SudoFileOperations, createFileOperations, isWritable } from './file-operations';
import { InstallLayout } from './types';
import { FakeExecutor, TEST_TEMP_DIR, createTestLayout } from '../test-setup';

describe('createFileOperations', () => {
  let layout: InstallLayout;

  beforeEach(() => {
    layout = createTestLayout();
  });

  it('should write system paths directly when they are writable', () => {
    const fileOps = createFileOperations(layout, new FakeExecutor());

    expect(fileOps.system).toBeInstanceOf(LocalFileOperations);
    expect(fileOps.system.domain).toBe('system');
    expect(fileOps.user).toBeInstanceOf(LocalFileOperations);
    expect(fileOps.user.domain).toBe('user');
  });

  it('should go through sudo when a system directory is not writable', () => {
    const fileOps = createFileOperations(layout, new FakeExecutor(), target => target !== layout.binDir);

    expect(fileOps.system).toBeInstanceOf(SudoFileOperations);
    expect(fileOps.system.domain).toBe('system');
    expect(fileOps.user).toBeInstanceOf(LocalFileOperations);
  });

  it('should check both system directories', () => {
    const checked: string[] = [];

    createFileOperations(layout, new FakeExecutor(), target => {
      checked.push(target);
      return true;
    });

    expect(checked).toEqual([layout.installDir, layout.binDir]);
  });
});

describe('isWritable', () => {
  it('should accept an existing writable directory', () => {
    expect(isWritable(TEST_TEMP_DIR)).toBe(true);
  });

  it('should judge a missing path by its nearest existing parent', () => {
    expect(isWritable(path.join(TEST_TEMP_DIR, 'usr', 'lib', 'tuxagent'))).toBe(true);
    expect(fs.existsSync(path.join(TEST_TEMP_DIR, 'usr'))).toBe(false);
  });
});

describe('LocalFileOperations', () => {
  const root = () => path.join(TEST_TEMP_DIR, 'files');

  it('should merge a copied directory into an existing destination', async () => {
    fs.mkdirSync(path.join(root(), 'source', 'ui'), { recursive: true });
    fs.writeFileSync(path.join(root(), 'source', 'ui', 'main.py'), 'new');
    fs.mkdirSync(path.join(root(), 'dest', 'ui'), { recursive: true });
    fs.writeFileSync(path.join(root(), 'dest', 'ui', 'main.py'), 'old');
    fs.writeFileSync(path.join(root(), 'dest', 'extra.py'), 'kept');

    await new LocalFileOperations('system').copy(path.join(root(), 'source'), path.join(root(), 'dest'));

    expect(fs.readFileSync(path.join(root(), 'dest', 'ui', 'main.py'), 'utf-8')).toBe('new');
    expect(fs.readFileSync(path.join(root(), 'dest', 'extra.py'), 'utf-8')).toBe('kept');
  });

  it('should create parent directories for a single copied file', async () => {
    fs.mkdirSync(root(), { recursive: true });
    fs.writeFileSync(path.join(root(), 'ext.py'), '# ext');

    await new LocalFileOperations('user').copy(path.join(root(), 'ext.py'), path.join(root(), 'a', 'b', 'ext.py'));

    expect(fs.readFileSync(path.join(root(), 'a', 'b', 'ext.py'), 'utf-8')).toBe('# ext');
  });
});
