/**
 * Scheduler Unit Tests
 *
 * Tests for the Cronark loop: rotation, job execution, duplicate
 * prevention and lifecycle hooks.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Cronark } from '../../../src/core/scheduler.js';
import { StateStoreError } from '../../../src/errors.js';
import { MemoryStore } from '../../../src/storage/memory.js';
import { NodeProcessMonitor } from '../../../src/process/monitor.js';
import { CronarkError } from '../../../src/errors.js';
import type { Job } from '../../../src/types.js';
import {
  createTestCronark,
  failingJob,
  FailingWriteStore,
  FakeProcessMonitor,
  recordingJob,
  SCRIPT_PATH,
  type TestContext,
} from '../../helpers/fakes.js';

describe('Cronark', () => {
  let ctx: TestContext;
  let log: string[];

  beforeEach(() => {
    ctx = createTestCronark();
    log = [];
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  // ===========================================================================
  // Registration
  // ===========================================================================

  describe('addJob()', () => {
    it('should define classes in the catalog under their job name', () => {
      const J1 = recordingJob('J1', log);

      ctx.cronark.addJob(J1, 'w');

      expect(ctx.cronark.registry.jobs('w')).toEqual(['J1']);
      expect(ctx.cronark.catalog.resolve('J1')).toBe(J1);
    });

    it('should accept job types defined separately', () => {
      ctx.cronark.define('send', recordingJob('J1', log));
      ctx.cronark.addJob('send', 'w');
      ctx.cronark.addJob('send', 'w', 0);

      expect(ctx.cronark.registry.jobs('w')).toEqual(['send', 'send']);
    });

    it('should reject two classes sharing a job name', () => {
      ctx.cronark.addJob(recordingJob('cleanup', log), 'a');

      expect(() => ctx.cronark.addJob(recordingJob('cleanup', log), 'b')).toThrow(CronarkError);
      expect(ctx.cronark.registry.jobs('b')).toEqual([]);
    });
  });

  describe('getJob()', () => {
    it('should default to the main worker outside the loop', () => {
      ctx.cronark.addJob('a');

      expect(ctx.cronark.getJob(0)).toBe('a');
      expect(ctx.cronark.getJob(0, 'other')).toBeNull();
    });
  });

  // ===========================================================================
  // Delay
  // ===========================================================================

  describe('delay', () => {
    it('should default to 100ms', () => {
      const cronark = new Cronark({ store: new MemoryStore(), monitor: new FakeProcessMonitor(), diagnostics: false });

      expect(cronark.getDelay()).toBe(100);
    });

    it('should clamp negative delays to zero', () => {
      expect(ctx.cronark.setDelay(-50).getDelay()).toBe(0);
    });

    it('should convert seconds to milliseconds', () => {
      expect(ctx.cronark.setDelaySeconds(0.25).getDelay()).toBe(250);
    });

    it('should take the configured delay', () => {
      const cronark = new Cronark({ store: new MemoryStore(), monitor: new FakeProcessMonitor(), delay: 30 });

      expect(cronark.getDelay()).toBe(30);
    });
  });

  // ===========================================================================
  // Rotation
  // ===========================================================================

  describe('nextIndex()', () => {
    beforeEach(() => {
      ctx.cronark.addJob('a', 'w');
      ctx.cronark.addJob('b', 'w');
      ctx.cronark.addJob('c', 'w');
    });

    it('should cycle through every position and wrap to zero', () => {
      ctx.cronark.saveHash(ctx.cronark.registry.hash('w'), 'w');

      const indexes = [1, 2, 3, 4].map(() => ctx.cronark.nextIndex('w'));

      expect(indexes).toEqual([0, 1, 2, 0]);
      expect(ctx.cronark.getCurrentIndex('w')).toBe(0);
    });

    it('should return null while the saved hash is stale', () => {
      expect(ctx.cronark.nextIndex('w')).toBeNull();
    });

    it('should return null for a worker without jobs', () => {
      ctx.cronark.registerWorker('empty');
      ctx.cronark.saveHash(ctx.cronark.registry.hash('empty'), 'empty');

      expect(ctx.cronark.nextIndex('empty')).toBeNull();
    });

    it('should land on zero once the new hash is saved after a change', () => {
      ctx.cronark.saveHash(ctx.cronark.registry.hash('w'), 'w');
      ctx.cronark.nextIndex('w');
      ctx.cronark.nextIndex('w');

      ctx.cronark.addJob('d', 'w');
      expect(ctx.cronark.getCurrentIndex('w')).toBeNull();
      expect(ctx.cronark.nextIndex('w')).toBeNull();

      ctx.cronark.saveHash(ctx.cronark.registry.hash('w'), 'w');
      expect(ctx.cronark.nextIndex('w')).toBe(0);
    });

    it('should throw when the index cannot be saved', () => {
      const failing = createTestCronark({ store: new FailingWriteStore('current_job_index') });
      failing.cronark.addJob('a', 'w');
      failing.cronark.saveHash(failing.cronark.registry.hash('w'), 'w');

      expect(() => failing.cronark.nextIndex('w')).toThrow(StateStoreError);
    });
  });

  describe('nextJob()', () => {
    it('should return the job type at the next index', () => {
      ctx.cronark.addJob('a', 'w');
      ctx.cronark.addJob('b', 'w');
      ctx.cronark.saveHash(ctx.cronark.registry.hash('w'), 'w');

      expect(ctx.cronark.nextJob('w')).toBe('a');
      expect(ctx.cronark.nextJob('w')).toBe('b');
      expect(ctx.cronark.nextJob('w')).toBe('a');
    });
  });

  // ===========================================================================
  // Process ownership
  // ===========================================================================

  describe('isActive()', () => {
    it('should be false without a stored pid', () => {
      expect(ctx.cronark.isActive('w')).toBe(false);
    });

    it('should be false when the stored process is gone', () => {
      ctx.cronark.setPid(9999, 'w');

      expect(ctx.cronark.isActive('w')).toBe(false);
    });

    it('should be true for the calling process itself', () => {
      ctx.cronark.setPid(ctx.monitor.pid, 'w');

      expect(ctx.cronark.isActive('w')).toBe(true);
    });

    it('should be true for another process running the same script', () => {
      ctx.monitor.processes.set(5000, SCRIPT_PATH);
      ctx.cronark.setPid(5000, 'w');

      expect(ctx.cronark.isActive('w')).toBe(true);
    });

    it('should be false for a recycled pid running another program', () => {
      ctx.monitor.processes.set(5000, '/usr/sbin/sshd');
      ctx.cronark.setPid(5000, 'w');

      expect(ctx.cronark.isActive('w')).toBe(false);
    });

    it('should assume active when a script path cannot be determined', () => {
      ctx.monitor.processes.set(5000, null);
      ctx.cronark.setPid(5000, 'w');

      expect(ctx.cronark.isActive('w')).toBe(true);
    });
  });

  describe('kill()', () => {
    it('should return false without a stored pid', () => {
      expect(ctx.cronark.kill('w')).toBe(false);
      expect(ctx.monitor.terminated).toEqual([]);
    });

    it('should terminate the owner and clear the pid', () => {
      ctx.monitor.processes.set(5000, SCRIPT_PATH);
      ctx.cronark.setPid(5000, 'w');

      expect(ctx.cronark.kill('w')).toBe(true);
      expect(ctx.monitor.terminated).toEqual([5000]);
      expect(ctx.cronark.getPid('w')).toBeNull();
    });

    it('should clear the pid of a process that is already gone', () => {
      ctx.cronark.setPid(5000, 'w');

      expect(ctx.cronark.kill('w')).toBe(true);
      expect(ctx.cronark.getPid('w')).toBeNull();
    });

    it('should keep the pid when the process survives', () => {
      ctx.monitor.processes.set(5000, SCRIPT_PATH);
      ctx.monitor.unkillable.add(5000);
      ctx.cronark.setPid(5000, 'w');

      expect(ctx.cronark.kill('w')).toBe(false);
      expect(ctx.cronark.getPid('w')).toBe(5000);
    });
  });

  describe('killAll()', () => {
    it('should kill every registered worker and ignore failures', () => {
      ctx.cronark.registerWorker('a');
      ctx.cronark.registerWorker('b');
      ctx.cronark.registerWorker('c');
      ctx.cronark.registerWorker('d');
      ctx.monitor.processes.set(5001, SCRIPT_PATH);
      ctx.monitor.processes.set(5004, SCRIPT_PATH);
      ctx.monitor.unkillable.add(5004);
      ctx.cronark.setPid(5001, 'a');
      ctx.cronark.setPid(5002, 'b');
      ctx.cronark.setPid(5004, 'd');

      expect(ctx.cronark.killAll()).toEqual(['a', 'b']);
      expect(ctx.cronark.getPid('a')).toBeNull();
      expect(ctx.cronark.getPid('b')).toBeNull();
      expect(ctx.cronark.getPid('d')).toBe(5004);
    });

    it('should keep going when killing one worker throws', () => {
      ctx.cronark.registerWorker('a');
      ctx.cronark.registerWorker('b');
      ctx.monitor.processes.set(5001, SCRIPT_PATH);
      ctx.monitor.processes.set(5002, SCRIPT_PATH);
      ctx.cronark.setPid(5001, 'a');
      ctx.cronark.setPid(5002, 'b');
      const terminate = ctx.monitor.terminate.bind(ctx.monitor);
      vi.spyOn(ctx.monitor, 'terminate').mockImplementation((pid) => {
        if (pid === 5001) {
          throw new Error('kill EPERM');
        }
        return terminate(pid);
      });

      expect(ctx.cronark.killAll()).toEqual(['b']);
      expect(ctx.cronark.getPid('a')).toBe(5001);
      expect(ctx.cronark.getPid('b')).toBeNull();
    });

    it('should skip processes owned by another user', () => {
      vi.spyOn(process, 'kill').mockImplementation((pid, signal) => {
        if (signal === 0 || pid === 777002) {
          return true;
        }
        throw Object.assign(new Error('kill EPERM'), { code: 'EPERM' });
      });
      const cronark = new Cronark({ store: new MemoryStore(), monitor: new NodeProcessMonitor(), diagnostics: false });
      cronark.registerWorker('a');
      cronark.registerWorker('b');
      cronark.setPid(777001, 'a');
      cronark.setPid(777002, 'b');

      expect(cronark.killAll()).toEqual(['b']);
      expect(cronark.getPid('a')).toBe(777001);
      expect(cronark.getPid('b')).toBeNull();
    });
  });

  // ===========================================================================
  // Job execution
  // ===========================================================================

  describe('handle()', () => {
    beforeEach(() => {
      ctx.cronark.addJob(recordingJob('J1', log), 'w');
    });

    it('should construct and run the job once', async () => {
      await expect(ctx.cronark.handle('J1', 0, 'w')).resolves.toBe(true);

      expect(log).toEqual(['J1']);
    });

    it('should refuse missing job types and indexes', async () => {
      await expect(ctx.cronark.handle(null, 0, 'w')).resolves.toBe(false);
      await expect(ctx.cronark.handle('J1', null, 'w')).resolves.toBe(false);

      expect(log).toEqual([]);
    });

    it('should refuse an index that no longer names a job', async () => {
      await expect(ctx.cronark.handle('J1', 3, 'w')).resolves.toBe(false);

      expect(log).toEqual([]);
    });

    it('should refuse job types missing from the catalog', async () => {
      ctx.cronark.addJob('ghost', 'w');

      await expect(ctx.cronark.handle('ghost', 1, 'w')).resolves.toBe(false);
      expect(ctx.errors).toEqual([]);
    });

    it('should contain job faults and report them', async () => {
      ctx.cronark.addJob(failingJob('Boom', 'kaput'), 'w');

      await expect(ctx.cronark.handle('Boom', 1, 'w')).resolves.toBe(false);

      expect(ctx.errors).toHaveLength(1);
      expect(ctx.errors[0]?.message).toBe('kaput');
      expect(ctx.cronark.getCurrentJob()).toBeNull();
    });

    it('should contain faults thrown by the constructor', async () => {
      class BrokenJob implements Job {
        constructor() {
          throw new Error('cannot construct');
        }
        handle(): void {}
      }
      ctx.cronark.addJob(BrokenJob, 'w');

      await expect(ctx.cronark.handle('BrokenJob', 1, 'w')).resolves.toBe(false);
      expect(ctx.errors[0]?.message).toBe('cannot construct');
    });

    it('should wrap non-error values thrown by a job', async () => {
      class ThrowsString implements Job {
        handle(): void {
          throw 'plain string';
        }
      }
      ctx.cronark.addJob(ThrowsString, 'w');

      await ctx.cronark.handle('ThrowsString', 1, 'w');

      expect(ctx.errors[0]).toBeInstanceOf(Error);
      expect(ctx.errors[0]?.message).toBe('plain string');
    });

    it('should await async jobs', async () => {
      class SlowJob implements Job {
        async handle(): Promise<void> {
          await new Promise((resolve) => setTimeout(resolve, 5));
          log.push('slow');
        }
      }
      ctx.cronark.addJob(SlowJob, 'w');

      await ctx.cronark.handle('SlowJob', 1, 'w');

      expect(log).toEqual(['slow']);
    });

    it('should pass the scheduler to the job and expose the current job', async () => {
      let seen: string | null = null;
      class InspectJob implements Job {
        constructor(private readonly cronark: Cronark) {}
        handle(): void {
          seen = this.cronark.getCurrentJob();
        }
      }
      ctx.cronark.addJob(InspectJob, 'w');

      await ctx.cronark.handle('InspectJob', 1, 'w');

      expect(seen).toBe('InspectJob');
      expect(ctx.cronark.getCurrentJob()).toBeNull();
    });
  });

  // ===========================================================================
  // Main loop
  // ===========================================================================

  describe('start()', () => {
    it('should ignore a second start while a worker is running', async () => {
      const local = createTestCronark({ delay: 5 });
      local.cronark.addJob(recordingJob('A', log), 'one');
      local.cronark.addJob(recordingJob('B', log), 'two');
      local.cronark.maxIterations = 4;

      await Promise.all([local.cronark.start('one'), local.cronark.start('two')]);

      expect(log).toEqual(['A', 'A', 'A', 'A']);
      expect(local.cronark.getPid('two')).toBeNull();
      expect(local.cronark.getCurrentWorker()).toBeNull();
    });

    it('should run jobs in registry order', async () => {
      ctx.cronark.addJob(recordingJob('J1', log), 'w');
      ctx.cronark.addJob(recordingJob('J2', log), 'w');
      ctx.cronark.addJob(recordingJob('J3', log), 'w');
      ctx.cronark.maxIterations = 3;

      await ctx.cronark.start('w');

      expect(log).toEqual(['J1', 'J2', 'J3']);
    });

    it('should wrap around the job list', async () => {
      ctx.cronark.addJob(recordingJob('J1', log), 'w');
      ctx.cronark.addJob(recordingJob('J2', log), 'w');
      ctx.cronark.maxIterations = 5;

      await ctx.cronark.start('w');

      expect(log).toEqual(['J1', 'J2', 'J1', 'J2', 'J1']);
    });

    it('should continue after a failing job', async () => {
      ctx.cronark.addJob(recordingJob('J1', log), 'w');
      ctx.cronark.addJob(failingJob('Jfail'), 'w');
      ctx.cronark.addJob(recordingJob('J2', log), 'w');
      ctx.cronark.maxIterations = 3;

      await ctx.cronark.start('w');

      expect(log).toEqual(['J1', 'J2']);
      expect(ctx.errors).toHaveLength(1);
      expect(ctx.errors[0]?.message).toBe('Job failed intentionally');
    });

    it('should not run when the worker is already active', async () => {
      ctx.cronark.addJob(recordingJob('J1', log), 'w');
      ctx.cronark.setPid(ctx.monitor.pid, 'w');
      ctx.cronark.maxIterations = 3;

      await ctx.cronark.start('w');

      expect(log).toEqual([]);
      expect(ctx.cronark.iterations).toBe(0);
    });

    it('should not claim a worker held by another live process', async () => {
      ctx.cronark.addJob(recordingJob('J1', log), 'w');
      ctx.monitor.processes.set(5000, SCRIPT_PATH);
      ctx.cronark.setPid(5000, 'w');
      ctx.cronark.maxIterations = 3;

      await ctx.cronark.start('w');

      expect(log).toEqual([]);
      expect(ctx.cronark.getPid('w')).toBe(5000);
    });

    it('should take over from a dead process', async () => {
      ctx.cronark.addJob(recordingJob('J1', log), 'w');
      ctx.cronark.setPid(5000, 'w');
      ctx.cronark.maxIterations = 2;

      await ctx.cronark.start('w');

      expect(log).toEqual(['J1', 'J1']);
      expect(ctx.cronark.getPid('w')).toBe(ctx.monitor.pid);
    });

    it('should stop once another process overwrites the pid', async () => {
      ctx.cronark.addJob(recordingJob('J1', log), 'w');
      ctx.cronark.changePidAfterIterations = 2;
      ctx.cronark.maxIterations = 10;

      await ctx.cronark.start('w');

      expect(log).toEqual(['J1', 'J1']);
      expect(ctx.cronark.getPid('w')).toBe(999999);
    });

    it('should stop when a job takes the pid away', async () => {
      class HandOver implements Job {
        constructor(private readonly cronark: Cronark) {}
        handle(): void {
          log.push('handover');
          this.cronark.setPid(null, 'w');
        }
      }
      ctx.cronark.addJob(HandOver, 'w');
      ctx.cronark.maxIterations = 5;

      await ctx.cronark.start('w');

      expect(log).toEqual(['handover']);
    });

    it('should stop when the job list changes mid-loop', async () => {
      const J2 = recordingJob('J2', log);
      class Grow implements Job {
        constructor(private readonly cronark: Cronark) {}
        handle(): void {
          log.push('grow');
          this.cronark.addJob(J2, 'w');
        }
      }
      ctx.cronark.addJob(Grow, 'w');
      ctx.cronark.maxIterations = 5;

      await ctx.cronark.start('w');

      expect(log).toEqual(['grow']);
      expect(ctx.cronark.hashChanged('w')).toBe(true);
    });

    it('should not start an unregistered worker', async () => {
      const onStarted = vi.fn();
      const onStopped = vi.fn();
      const local = createTestCronark({}, { onStarted, onStopped });

      await local.cronark.start('missing');

      expect(onStarted).not.toHaveBeenCalled();
      expect(onStopped).toHaveBeenCalledWith('missing');
      expect(local.cronark.getSavedHash('missing')).toBeNull();
    });

    it('should save the hash but not claim a worker without jobs', async () => {
      ctx.cronark.registerWorker('empty');

      await ctx.cronark.start('empty');

      expect(ctx.cronark.getSavedHash('empty')).toBe(ctx.cronark.registry.hash('empty'));
      expect(ctx.cronark.getPid('empty')).toBeNull();
    });

    it('should reset a stale stored index before looping', async () => {
      ctx.cronark.addJob(recordingJob('J1', log), 'w');
      ctx.cronark.addJob(recordingJob('J2', log), 'w');
      ctx.cronark.saveHash(ctx.cronark.registry.hash('w'), 'w');
      ctx.cronark.setCurrentIndex(1, 'w');
      ctx.cronark.maxIterations = 1;

      await ctx.cronark.start('w');

      expect(log).toEqual(['J1']);
    });

    it('should run workers independently', async () => {
      ctx.cronark.addJob(recordingJob('A', log), 'one');
      ctx.cronark.addJob(recordingJob('B', log), 'two');

      ctx.cronark.maxIterations = 2;
      await ctx.cronark.start('one');
      ctx.cronark.iterations = 0;
      await ctx.cronark.start('two');

      expect(log).toEqual(['A', 'A', 'B', 'B']);
    });

    it('should expose the running worker to jobs and clear it afterwards', async () => {
      class WhoAmI implements Job {
        constructor(private readonly cronark: Cronark) {}
        handle(): void {
          log.push(`${this.cronark.getCurrentWorker()}/${this.cronark.getCurrentJob()}`);
        }
      }
      ctx.cronark.addJob(WhoAmI, 'w');
      ctx.cronark.maxIterations = 1;

      await ctx.cronark.start('w');

      expect(log).toEqual(['w/WhoAmI']);
      expect(ctx.cronark.getCurrentWorker()).toBeNull();
    });

    it('should wait the configured delay after each job', async () => {
      ctx.cronark.setDelay(20);
      ctx.cronark.addJob(recordingJob('J1', log), 'w');
      ctx.cronark.maxIterations = 2;

      const startedAt = Date.now();
      await ctx.cronark.start('w');

      expect(log).toEqual(['J1', 'J1']);
      expect(Date.now() - startedAt).toBeGreaterThanOrEqual(30);
    });

    describe('hooks', () => {
      it('should fire lifecycle hooks in order', async () => {
        const events: string[] = [];
        const local = createTestCronark(
          {},
          {
            onStarted: (worker) => events.push(`started:${worker}`),
            onJobCreating: (jobType) => events.push(`creating:${jobType}`),
            onResume: (jobType, index, _worker, isFirst) => events.push(`resume:${jobType}:${index}:${isFirst}`),
            onStopped: (worker) => events.push(`stopped:${worker}`),
          }
        );
        local.cronark.addJob(recordingJob('J1', log), 'w');
        local.cronark.addJob(recordingJob('J2', log), 'w');
        local.cronark.maxIterations = 2;

        await local.cronark.start('w');

        expect(events).toEqual([
          'started:w',
          'creating:J1',
          'resume:J2:1:true',
          'creating:J2',
          'resume:J1:0:false',
          'stopped:w',
        ]);
      });

      it('should route faults escaping the loop to onError and still tear down', async () => {
        const onStopped = vi.fn();
        const local = createTestCronark(
          {},
          {
            onStarted: () => {
              throw new Error('boom');
            },
            onStopped,
          }
        );
        local.cronark.addJob(recordingJob('J1', log), 'w');

        await expect(local.cronark.start('w')).resolves.toBeUndefined();

        expect(local.errors.map((e) => e.message)).toEqual(['boom']);
        expect(onStopped).toHaveBeenCalledWith('w');
        expect(local.cronark.getCurrentWorker()).toBeNull();
      });

      it('should report a failing onStopped hook', async () => {
        const local = createTestCronark(
          {},
          {
            onStopped: () => {
              throw new Error('teardown failed');
            },
          }
        );

        await local.cronark.start('missing');

        expect(local.errors.map((e) => e.message)).toEqual(['teardown failed']);
      });

      it('should not let a throwing onError hook escape start()', async () => {
        const local = createTestCronark(
          {},
          {
            onError: () => {
              throw new Error('hook broke');
            },
          }
        );
        local.cronark.addJob(failingJob('Jfail'), 'w');
        local.cronark.maxIterations = 2;

        await expect(local.cronark.start('w')).resolves.toBeUndefined();
        expect(local.cronark.iterations).toBe(2);
      });
    });

    describe('persistence faults', () => {
      it('should report a pid that cannot be saved and not run', async () => {
        const local = createTestCronark({ store: new FailingWriteStore('pid') });
        local.cronark.addJob(recordingJob('J1', log), 'w');
        local.cronark.maxIterations = 2;

        await local.cronark.start('w');

        expect(log).toEqual([]);
        expect(local.errors).toHaveLength(1);
        expect(local.errors[0]).toBeInstanceOf(StateStoreError);
        expect(local.errors[0]).toMatchObject({ worker: 'w', key: 'pid' });
      });

      it('should report a jobs hash that cannot be saved', async () => {
        const local = createTestCronark({ store: new FailingWriteStore('jobs_hash') });
        local.cronark.addJob(recordingJob('J1', log), 'w');

        await local.cronark.start('w');

        expect(log).toEqual([]);
        expect(local.errors[0]).toMatchObject({ key: 'jobs_hash' });
        expect(local.cronark.getPid('w')).toBeNull();
      });

      it('should not loop when the job index cannot be reset', async () => {
        const local = createTestCronark({ store: new FailingWriteStore('current_job_index') });
        local.cronark.addJob(recordingJob('J1', log), 'w');
        local.cronark.maxIterations = 2;

        await local.cronark.start('w');

        expect(log).toEqual([]);
        expect(local.errors[0]).toMatchObject({ key: 'current_job_index' });
      });
    });
  });

  // ===========================================================================
  // Diagnostics
  // ===========================================================================

  describe('print()', () => {
    it('should prefix messages with worker and current job', async () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
      const cronark = new Cronark({ store: new MemoryStore(), monitor: new FakeProcessMonitor(), diagnostics: true });
      class Speak implements Job {
        constructor(private readonly owner: Cronark) {}
        handle(): void {
          this.owner.print('hello', 'w');
        }
      }
      cronark.addJob(Speak, 'w');

      cronark.print('outside');
      await cronark.handle('Speak', 0, 'w');

      const lines = spy.mock.calls.map((call) => call[0]);
      expect(lines[0]).toBe('> Cronark:\n  outside');
      expect(lines).toContain('> Cronark::w.Speak:\n  hello');
    });

    it('should stay silent when diagnostics are off', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});

      ctx.cronark.print('nothing to see');

      expect(spy).not.toHaveBeenCalled();
    });
  });
});
