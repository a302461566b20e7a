import { CleanOrchestrator } from '../CleanOrchestrator';
import {
  IEntryExpander,
  IPathCanonicalizer,
  IProfileLoader,
  IPrompter,
  IRemover,
  RemovalResult
} from '../../interfaces';
import { Entry, ExpansionOutcome, Profile } from '../../types';
import { EntryError, ProfileLoadError, RemoveError } from '../../errors';
import { Reporter } from '../../reporters/Reporter';
import { ProfileLoader } from '../../loaders/ProfileLoader';
import { EntryExpander } from '../../resolvers/EntryExpander';
import { PathCanonicalizer } from '../../resolvers/PathCanonicalizer';
import { Remover } from '../../removers/Remover';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

// Mock implementations
class MockProfileLoader implements IProfileLoader {
  constructor(private profile: Profile | Error) {}

  async load(profilePath: string): Promise<Profile> {
    if (this.profile instanceof Error) {
      throw new ProfileLoadError(profilePath, this.profile.message);
    }
    return this.profile;
  }
}

class MockEntryExpander implements IEntryExpander {
  expanded: Entry[] = [];

  constructor(private pathsByEntry: Map<Entry, string[]>) {}

  async expand(entry: Entry): Promise<string[]> {
    this.expanded.push(entry);
    if (entry.type === 'pattern') {
      this.validatePattern(entry.pattern);
    }
    return this.pathsByEntry.get(entry) ?? [];
  }

  async expandAll(entries: readonly Entry[]): Promise<ExpansionOutcome[]> {
    const outcomes: ExpansionOutcome[] = [];
    for (const entry of entries) {
      try {
        outcomes.push({ entry, paths: await this.expand(entry) });
      } catch (error) {
        if (!(error instanceof EntryError)) {
          throw error;
        }
        outcomes.push({ entry, paths: [], error: error.toCleanError(`Pattern <${error.pattern}>`) });
      }
    }
    return outcomes;
  }

  validatePattern(pattern: string): void {
    if (pattern.includes('[')) {
      throw new EntryError(pattern, 'unclosed bracket');
    }
  }
}

class IdentityCanonicalizer implements IPathCanonicalizer {
  async canonicalize(paths: readonly string[]): Promise<string[]> {
    return [...paths];
  }
}

class MockRemover implements IRemover {
  removed: string[] = [];

  constructor(private results: Map<string, RemovalResult | Error> = new Map()) {}

  async remove(target: string): Promise<RemovalResult> {
    this.removed.push(target);
    const result = this.results.get(target);
    if (result instanceof Error) {
      throw result;
    }
    return result ?? { path: target, kind: 'file', success: true, bytesReclaimed: 100, errors: [] };
  }
}

class ScriptedPrompter implements IPrompter {
  questions: string[] = [];

  constructor(private answers: boolean[]) {}

  async confirm(question: string): Promise<boolean> {
    this.questions.push(question);
    return this.answers.shift() ?? false;
  }
}

describe('CleanOrchestrator', () => {
  const pathEntry: Entry = { type: 'path', path: '/work/dist' };
  const patternEntry: Entry = {
    type: 'pattern',
    pattern: '/work/logs/*.log',
    retention: { kind: 'count', order: 'modified', count: 1 }
  };
  const brokenEntry: Entry = { type: 'pattern', pattern: '/work/[logs' };

  const profile: Profile = { name: 'workspace', entries: [pathEntry, patternEntry] };
  const expansions = new Map<Entry, string[]>([
    [pathEntry, ['/work/dist']],
    [patternEntry, ['/work/logs/b.log', '/work/logs/a.log']]
  ]);

  let reporter: Reporter;

  function createOrchestrator(
    options: {
      profile?: Profile | Error;
      expander?: MockEntryExpander;
      remover?: MockRemover;
      prompter?: ScriptedPrompter;
    } = {}
  ): CleanOrchestrator {
    return new CleanOrchestrator(
      new MockProfileLoader(options.profile ?? profile),
      options.expander ?? new MockEntryExpander(expansions),
      new IdentityCanonicalizer(),
      options.remover ?? new MockRemover(),
      reporter,
      options.prompter ?? new ScriptedPrompter([])
    );
  }

  beforeEach(() => {
    reporter = new Reporter();
    reporter.getLogger().silent = true;
  });

  afterEach(() => {
    jest.restoreAllMocks();
    reporter.close();
  });

  describe('Silent mode', () => {
    it('should remove every resolved path without prompting', async () => {
      const remover = new MockRemover();
      const prompter = new ScriptedPrompter([]);

      const report = await createOrchestrator({ remover, prompter }).clean('profile.json', 'silent');

      expect(remover.removed).toEqual(['/work/dist', '/work/logs/b.log', '/work/logs/a.log']);
      expect(prompter.questions).toEqual([]);
      expect(report.profileName).toBe('workspace');
      expect(report.mode).toBe('silent');
      expect(report.summary).toMatchObject({
        entriesProcessed: 2,
        pathsResolved: 3,
        pathsRemoved: 3,
        pathsSkipped: 0,
        pathsFailed: 0,
        bytesReclaimed: 300
      });
      expect(report.details.errors).toEqual([]);
    });

    it('should succeed with nothing to do for an empty profile', async () => {
      const remover = new MockRemover();

      const report = await createOrchestrator({ profile: { name: 'empty', entries: [] }, remover }).clean('p.json', 'silent');

      expect(remover.removed).toEqual([]);
      expect(report.summary.pathsResolved).toBe(0);
      expect(report.summary.bytesReclaimed).toBe(0);
    });
  });

  describe('Every entry mode', () => {
    it('should only expand the entries the user accepts', async () => {
      const expander = new MockEntryExpander(expansions);
      const remover = new MockRemover();
      const prompter = new ScriptedPrompter([false, true]);

      const report = await createOrchestrator({ expander, remover, prompter }).clean('p.json', 'everyEntry');

      expect(prompter.questions).toEqual([
        'Include entry [Path </work/dist>]?',
        'Include entry [Pattern </work/logs/*.log> keeping 1 by modified]?'
      ]);
      expect(expander.expanded).toEqual([patternEntry]);
      expect(remover.removed).toEqual(['/work/logs/b.log', '/work/logs/a.log']);
      expect(report.summary.entriesProcessed).toBe(1);
    });
  });

  describe('Every path mode', () => {
    it('should skip paths the user declines', async () => {
      const remover = new MockRemover();
      const prompter = new ScriptedPrompter([true, false, true]);

      const report = await createOrchestrator({ remover, prompter }).clean('p.json', 'everyPath');

      expect(prompter.questions).toEqual([
        'Delete path </work/dist>?',
        'Delete path </work/logs/b.log>?',
        'Delete path </work/logs/a.log>?'
      ]);
      expect(remover.removed).toEqual(['/work/dist', '/work/logs/a.log']);
      expect(report.details.skipped).toEqual(['/work/logs/b.log']);
      expect(report.summary.pathsSkipped).toBe(1);
      expect(report.summary.pathsRemoved).toBe(2);
    });
  });

  describe('Error handling', () => {
    it('should abort when the profile cannot be loaded', async () => {
      const remover = new MockRemover();

      await expect(
        createOrchestrator({ profile: new Error('failed to read file: ENOENT'), remover }).clean('gone.json', 'silent')
      ).rejects.toThrow('failed to load profile <gone.json> [failed to read file: ENOENT]');
      expect(remover.removed).toEqual([]);
    });

    it('should record an invalid pattern and continue with the other entries', async () => {
      const remover = new MockRemover();

      const report = await createOrchestrator({
        profile: { name: 'mixed', entries: [brokenEntry, pathEntry] },
        remover
      }).clean('p.json', 'silent');

      expect(remover.removed).toEqual(['/work/dist']);
      expect(report.details.errors).toHaveLength(1);
      expect(report.details.errors[0]).toMatchObject({
        type: 'invalid_pattern',
        message: 'failed to parse glob pattern </work/[logs> [unclosed bracket]'
      });
    });

    it('should count partial removals and keep going after a failure', async () => {
      const failure: RemovalResult = {
        path: '/work/dist',
        kind: 'directory',
        success: false,
        bytesReclaimed: 40,
        errors: [new RemoveError('removeDirectory', '/work/dist', new Error('EACCES: permission denied'))]
      };
      const remover = new MockRemover(new Map([['/work/dist', failure]]));

      const report = await createOrchestrator({ remover }).clean('p.json', 'silent');

      expect(remover.removed).toEqual(['/work/dist', '/work/logs/b.log', '/work/logs/a.log']);
      expect(report.summary.pathsRemoved).toBe(2);
      expect(report.summary.pathsFailed).toBe(1);
      expect(report.summary.bytesReclaimed).toBe(240);
      expect(report.details.removed.map(removed => removed.path)).toEqual(['/work/logs/b.log', '/work/logs/a.log']);
      expect(report.details.errors).toEqual([
        expect.objectContaining({
          type: 'remove_directory',
          path: '/work/dist',
          message: 'failed to remove directory </work/dist> [EACCES: permission denied]'
        })
      ]);
    });

    it('should record an unexpected removal failure as an unknown error', async () => {
      const remover = new MockRemover(new Map([['/work/dist', new Error('disk vanished')]]));

      const report = await createOrchestrator({ remover }).clean('p.json', 'silent');

      expect(report.summary.pathsRemoved).toBe(2);
      expect(report.summary.pathsFailed).toBe(1);
      expect(report.details.errors).toEqual([
        expect.objectContaining({ type: 'unknown', path: '/work/dist', message: 'disk vanished' })
      ]);
    });

    it('should count a failed directory once however many children failed', async () => {
      const failure: RemovalResult = {
        path: '/work/dist',
        kind: 'directory',
        success: false,
        bytesReclaimed: 0,
        errors: [
          new RemoveError('removeFile', '/work/dist/a', new Error('EACCES')),
          new RemoveError('removeFile', '/work/dist/b', new Error('EACCES')),
          new RemoveError('removeFile', '/work/dist/c', new Error('EACCES')),
          new RemoveError('removeDirectory', '/work/dist', new Error('ENOTEMPTY'))
        ]
      };
      const remover = new MockRemover(new Map([['/work/dist', failure]]));

      const report = await createOrchestrator({ remover }).clean('p.json', 'silent');

      expect(report.summary.pathsFailed).toBe(1);
      expect(report.details.errors).toHaveLength(4);
      expect(reporter.generateSummary(report).split('\n').pop()).toBe('Success Rate: 66.7%');
    });

    it('should return the report when saving it fails after removal', async () => {
      const remover = new MockRemover();
      jest.spyOn(reporter, 'saveReport').mockRejectedValue(new Error('Failed to save report: EROFS'));
      const saveSummary = jest.spyOn(reporter, 'saveSummary').mockResolvedValue(undefined);
      const logSaveFailure = jest.spyOn(reporter, 'logSaveFailure');

      const report = await createOrchestrator({ remover }).clean('p.json', 'silent');

      expect(report.summary.pathsRemoved).toBe(3);
      expect(remover.removed).toHaveLength(3);
      expect(saveSummary).toHaveBeenCalledWith(report);
      expect(logSaveFailure).toHaveBeenCalledWith('Failed to save report: EROFS');
    });
  });

  describe('validate', () => {
    it('should list every pattern that does not compile', async () => {
      const errors = await createOrchestrator({
        profile: { name: 'mixed', entries: [brokenEntry, pathEntry, patternEntry] }
      }).validate('p.json');

      expect(errors).toHaveLength(1);
      expect(errors[0]).toMatchObject({ type: 'invalid_pattern', entry: 'Pattern </work/[logs>' });
    });

    it('should return no errors for a valid profile', async () => {
      await expect(createOrchestrator().validate('p.json')).resolves.toEqual([]);
    });
  });

  describe('End to end', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'profile-sweep-clean-')));
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('should keep the newest log and delete the rest', async () => {
      const logs = path.join(tempDir, 'logs');
      await fs.mkdir(logs);
      const stamps: Array<[string, string]> = [
        ['old.log', '2024-01-01T00:00:00Z'],
        ['mid.log', '2024-02-01T00:00:00Z'],
        ['new.log', '2024-03-01T00:00:00Z']
      ];
      for (const [name, stamp] of stamps) {
        await fs.writeFile(path.join(logs, name), `${name} contents`);
        await fs.utimes(path.join(logs, name), new Date(stamp), new Date(stamp));
      }

      const profilePath = path.join(tempDir, 'profile.json');
      await fs.writeFile(profilePath, JSON.stringify({
        name: 't',
        entries: [
          { type: 'pattern', pattern: `${logs}/*.log`, retention: { order: 'modified', count: 1 } },
          { type: 'path', path: path.join(tempDir, 'never-created') }
        ]
      }));

      const orchestrator = new CleanOrchestrator(
        new ProfileLoader(),
        new EntryExpander(undefined, tempDir),
        new PathCanonicalizer(tempDir),
        new Remover(),
        reporter,
        new ScriptedPrompter([])
      );

      const report = await orchestrator.clean(profilePath, 'silent');

      expect(await fs.readdir(logs)).toEqual(['new.log']);
      expect(report.summary.pathsResolved).toBe(2);
      expect(report.summary.pathsRemoved).toBe(2);
      expect(report.summary.bytesReclaimed).toBe('old.log contents'.length + 'mid.log contents'.length);
      expect(report.details.removed.map(removed => removed.path)).toEqual([
        path.join(logs, 'mid.log'),
        path.join(logs, 'old.log')
      ]);
      expect(report.details.errors).toEqual([]);
    });
  });
});
