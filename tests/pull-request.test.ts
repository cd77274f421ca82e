import { describe, it, expect, vi } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { defaultBaseRef, defaultHeadRef, runPullRequest, type PullRequestDeps } from '../src/pull-request.js';
import { EditorError, UnpushedCommitsError, ValidationError } from '../src/errors.js';
import type { RepoContext } from '../src/types.js';

const PR_URL = 'https://github.com/alice/widgets/pull/7';

function createContext(overrides: Partial<RepoContext> = {}): RepoContext {
  const gitDir = mkdtempSync(join(tmpdir(), 'pullreq-git-'));
  return {
    owner: () => 'alice',
    repo: () => 'widgets',
    currentBranch: () => 'topic',
    editor: () => 'vim',
    gitDir: () => gitDir,
    commitLogs: vi.fn(() => 'abc1234 Add widget model\ndef5678 Wire widget into UI'),
    unpushedCommits: () => 0,
    ...overrides,
  };
}

/** Editor stand-in that prepends `text` to the draft, the way a user typing at the top would */
function typingEditor(text: string) {
  return vi.fn((argv: string[]) => {
    const path = argv[argv.length - 1];
    writeFileSync(path, text + readFileSync(path, 'utf-8'));
  });
}

function createDeps(overrides: Partial<PullRequestDeps> = {}): PullRequestDeps {
  return {
    context: createContext(),
    runEditor: typingEditor('Add widget\n\nImplements the widget.\n'),
    submit: vi.fn().mockResolvedValue(PR_URL),
    ...overrides,
  };
}

describe('default references', () => {
  it('builds the base from owner and master', () => {
    expect(defaultBaseRef(createContext())).toBe('alice:master');
  });

  it('uses a configured base branch', () => {
    expect(defaultBaseRef(createContext(), 'main')).toBe('alice:main');
  });

  it('builds the head from owner and current branch', () => {
    expect(defaultHeadRef(createContext())).toBe('alice:topic');
  });
});

describe('runPullRequest', () => {
  describe('editor flow', () => {
    it('submits the title and body written in the editor', async () => {
      const deps = createDeps();

      const url = await runPullRequest({}, deps);

      expect(url).toBe(PR_URL);
      expect(deps.submit).toHaveBeenCalledWith(
        { owner: 'alice', repo: 'widgets' },
        { title: 'Add widget', body: 'Implements the widget.', base: 'alice:master', head: 'alice:topic' },
      );
    });

    it('opens vim on the draft inside the git directory', async () => {
      const context = createContext();
      const deps = createDeps({ context });

      await runPullRequest({}, deps);

      const draft = join(context.gitDir(), 'PULLREQ_EDITMSG');
      expect(deps.runEditor).toHaveBeenCalledWith(['vim', '-c', 'set ft=gitcommit', draft]);
    });

    it('seeds the draft with the commits between base and head', async () => {
      const context = createContext();
      let seeded = '';
      const runEditor = vi.fn((argv: string[]) => {
        const path = argv[argv.length - 1];
        seeded = readFileSync(path, 'utf-8');
        writeFileSync(path, 'Title\n' + seeded);
      });

      await runPullRequest({ base: 'alice:develop', head: 'alice/widgets:feature/x' }, createDeps({ context, runEditor }));

      expect(context.commitLogs).toHaveBeenCalledWith('develop', 'feature/x');
      expect(seeded).toContain('# Requesting a pull to alice:develop from alice/widgets:feature/x\n');
      expect(seeded).toContain('#\n# abc1234 Add widget model\n# def5678 Wire widget into UI\n');
    });

    it('aborts without submitting when the title is left empty', async () => {
      const context = createContext();
      const deps = createDeps({ context, runEditor: vi.fn() });

      await expect(runPullRequest({}, deps)).rejects.toThrow(
        new ValidationError('Aborting due to empty pull request title'),
      );
      expect(deps.submit).not.toHaveBeenCalled();
      expect(existsSync(join(context.gitDir(), 'PULLREQ_EDITMSG'))).toBe(true);
    });

    it('propagates editor failures and keeps the draft', async () => {
      const context = createContext();
      const runEditor = vi.fn(() => {
        throw new EditorError("Editor 'vim' exited with status 1");
      });
      const deps = createDeps({ context, runEditor });

      await expect(runPullRequest({}, deps)).rejects.toThrow(EditorError);
      expect(deps.submit).not.toHaveBeenCalled();
      expect(existsSync(join(context.gitDir(), 'PULLREQ_EDITMSG'))).toBe(true);
    });

    it('propagates submission failures after the draft is parsed', async () => {
      const deps = createDeps({ submit: vi.fn().mockRejectedValue(new Error('Bad credentials')) });

      await expect(runPullRequest({}, deps)).rejects.toThrow('Bad credentials');
    });
  });

  describe('title given on the command line', () => {
    it('submits without opening the editor', async () => {
      const deps = createDeps();

      await runPullRequest({ title: 'Quick fix' }, deps);

      expect(deps.runEditor).not.toHaveBeenCalled();
      expect(deps.submit).toHaveBeenCalledWith(
        { owner: 'alice', repo: 'widgets' },
        { title: 'Quick fix', body: '', base: 'alice:master', head: 'alice:topic' },
      );
    });

    it('rejects a blank title', async () => {
      await expect(runPullRequest({ title: '  ' }, createDeps())).rejects.toThrow(ValidationError);
    });

    it('treats an issue URL as the issue to attach', async () => {
      const deps = createDeps();

      await runPullRequest({ title: 'https://github.com/alice/widgets/issues/9' }, deps);

      expect(deps.submit).toHaveBeenCalledWith(
        { owner: 'alice', repo: 'widgets' },
        { issue: 9, base: 'alice:master', head: 'alice:topic' },
      );
    });

    it('rejects an issue URL from another repository', async () => {
      const deps = createDeps();

      await expect(
        runPullRequest({ title: 'https://github.com/bob/gadgets/issues/9' }, deps),
      ).rejects.toThrow('Issue https://github.com/bob/gadgets/issues/9 does not belong to alice/widgets');
      expect(deps.submit).not.toHaveBeenCalled();
    });
  });

  describe('issue flag', () => {
    it('submits the issue number without opening the editor', async () => {
      const deps = createDeps();

      await runPullRequest({ issue: '12', head: 'bob:fix' }, deps);

      expect(deps.runEditor).not.toHaveBeenCalled();
      expect(deps.submit).toHaveBeenCalledWith(
        { owner: 'alice', repo: 'widgets' },
        { issue: 12, base: 'alice:master', head: 'bob:fix' },
      );
    });

    it('rejects an issue given together with a title', async () => {
      const deps = createDeps();

      await expect(runPullRequest({ issue: '12', title: 'Quick fix' }, deps)).rejects.toThrow(
        new ValidationError('Give either a title or -i ISSUE, not both'),
      );
      expect(deps.submit).not.toHaveBeenCalled();
    });

    it('rejects a non-numeric issue', async () => {
      await expect(runPullRequest({ issue: 'abc' }, createDeps())).rejects.toThrow('Invalid issue number: abc');
    });
  });

  describe('unpushed commits check', () => {
    it('aborts when the branch has unpushed commits', async () => {
      const deps = createDeps({ context: createContext({ unpushedCommits: () => 2 }) });

      await expect(runPullRequest({ title: 'T' }, deps)).rejects.toThrow(
        new UnpushedCommitsError(2),
      );
      expect(deps.submit).not.toHaveBeenCalled();
    });

    it('proceeds when forced', async () => {
      const deps = createDeps({ context: createContext({ unpushedCommits: () => 2 }) });

      await expect(runPullRequest({ title: 'T', force: true }, deps)).resolves.toBe(PR_URL);
    });
  });

  it('uses the configured default base branch', async () => {
    const deps = createDeps();

    await runPullRequest({ title: 'T', defaultBase: 'main' }, deps);

    expect(deps.submit).toHaveBeenCalledWith(
      { owner: 'alice', repo: 'widgets' },
      { title: 'T', body: '', base: 'alice:main', head: 'alice:topic' },
    );
  });

  it('reports base and head through the debug hook', async () => {
    const debug = vi.fn();

    await runPullRequest({ title: 'T' }, createDeps({ debug }));

    expect(debug).toHaveBeenCalledWith('Base: alice:master, head: alice:topic');
  });
});
