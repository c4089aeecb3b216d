import assert from 'assert';
import { DEFAULT_GIT_TIMEOUT, GitHistory, type GitRunner, type GitRunOptions, isNullRef, MemoryHistory, NULL_REF } from '../../src/index.ts';

interface RunCall {
  args: string[];
  options: GitRunOptions;
}

function recordingRunner(result: (args: string[]) => string): { run: GitRunner; calls: RunCall[] } {
  const calls: RunCall[] = [];
  const run: GitRunner = (args, options) => {
    calls.push({ args, options });
    return result(args);
  };
  return { run, calls };
}

describe('history', () => {
  describe('isNullRef', () => {
    it('should recognize the all-zero ref and the empty ref', () => {
      assert.equal(NULL_REF, '0000000000000000000000000000000000000000');
      assert.equal(isNullRef(NULL_REF), true);
      assert.equal(isNullRef(''), true);
      assert.equal(isNullRef('4b825dc642cb6eb9a060e54bf8d69288fbee4904'), false);
    });
  });

  describe('GitHistory', () => {
    it('should not run git for the null ref', () => {
      const { run, calls } = recordingRunner(() => 'unused');
      const history = new GitHistory({ cwd: '/repo', run });

      assert.equal(history.show(NULL_REF, 'crates/server/Cargo.toml'), undefined);
      assert.equal(calls.length, 0);
    });

    it('should show the file at the ref relative to cwd', () => {
      const { run, calls } = recordingRunner(() => '[package]\nversion = "1.1.9"\n');
      const history = new GitHistory({ cwd: '/repo', run });

      assert.equal(history.show('abc123', 'crates/server/Cargo.toml'), '[package]\nversion = "1.1.9"\n');
      assert.deepEqual(calls, [{ args: ['show', 'abc123:./crates/server/Cargo.toml'], options: { cwd: '/repo', timeout: DEFAULT_GIT_TIMEOUT } }]);
    });

    it('should normalize separators and a leading ./', () => {
      const { run, calls } = recordingRunner(() => '');
      const history = new GitHistory({ cwd: '/repo', timeout: 500, run });

      history.show('abc123', 'crates\\client\\Cargo.toml');
      history.show('abc123', './Cargo.toml');
      assert.deepEqual(
        calls.map((call) => call.args[1]),
        ['abc123:./crates/client/Cargo.toml', 'abc123:./Cargo.toml']
      );
      assert.equal(calls[0].options.timeout, 500);
    });

    it('should return undefined when git fails', () => {
      const history = new GitHistory({
        cwd: '/repo',
        run: () => {
          throw new Error("fatal: path 'crates/new/Cargo.toml' exists on disk, but not in 'abc123'");
        },
      });

      assert.equal(history.show('abc123', 'crates/new/Cargo.toml'), undefined);
      assert.equal(history.resolveParent(), undefined);
    });

    it('should resolve the parent commit', () => {
      const { run, calls } = recordingRunner(() => 'f00dfeed\n');
      const history = new GitHistory({ cwd: '/repo', run });

      assert.equal(history.resolveParent(), 'f00dfeed');
      assert.deepEqual(calls[0].args, ['rev-parse', 'HEAD^']);
    });

    it('should return undefined for an empty parent', () => {
      const { run } = recordingRunner(() => '\n');
      assert.equal(new GitHistory({ cwd: '/repo', run }).resolveParent(), undefined);
    });
  });

  describe('MemoryHistory', () => {
    const history = new MemoryHistory({ base1: { 'crates/server/Cargo.toml': 'server' } }, 'base1');

    it('should return content stored for the ref and path', () => {
      assert.equal(history.show('base1', 'crates/server/Cargo.toml'), 'server');
    });

    it('should return undefined for unknown refs and paths', () => {
      assert.equal(history.show('base2', 'crates/server/Cargo.toml'), undefined);
      assert.equal(history.show('base1', 'crates/client/Cargo.toml'), undefined);
    });

    it('should short-circuit the null ref without a lookup', () => {
      const fresh = new MemoryHistory({ [NULL_REF]: { 'Cargo.toml': 'never' } });
      assert.equal(fresh.show(NULL_REF, 'Cargo.toml'), undefined);
      assert.equal(fresh.lookups, 0);
    });

    it('should return the configured parent', () => {
      assert.equal(history.resolveParent(), 'base1');
      assert.equal(new MemoryHistory().resolveParent(), undefined);
    });
  });
});
