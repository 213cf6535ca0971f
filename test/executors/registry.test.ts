import { describe, it, expect } from 'vitest';
import { ExecutorRegistry } from '../../src/executors/registry.js';
import { createExecutorRegistry } from '../../src/executors/index.js';
import type { ExecutionContext } from '../../src/executors/types.js';
import { ValidationError } from '../../src/utils/errors.js';
import { ScriptedExecutor, createTestConfig } from '../fixtures/index.js';

describe('ExecutorRegistry', () => {
  it('should register the bundled docker executors', () => {
    const registry = createExecutorRegistry(createTestConfig());

    expect(registry.kinds()).toEqual(['push', 'pull', 'build']);
    expect(registry.has('build')).toBe(true);
    expect(registry.has('deploy')).toBe(false);
  });

  describe('prepare', () => {
    const registry = createExecutorRegistry(createTestConfig());

    it('should validate params and derive the key', () => {
      const prepared = registry.prepare('push', { imageName: 'registry.example.com/team/app', tag: '2.0.0' });

      expect(prepared).toEqual({
        kind: 'push',
        key: 'registry.example.com/team/app:2.0.0',
        params: {
          imageName: 'registry.example.com/team/app',
          tag: '2.0.0',
          allTags: false,
          disableContentTrust: true,
          quiet: false,
        },
      });
    });

    it('should prefer an explicit key', () => {
      const prepared = registry.prepare('pull', { imageName: 'alpine' }, 'mirror-lock');

      expect(prepared.key).toBe('mirror-lock');
      expect(prepared.params.tag).toBe('latest');
    });

    it('should reject unknown kinds', () => {
      expect(() => registry.prepare('deploy', {})).toThrow(ValidationError);
    });

    it('should reject unknown params', () => {
      expect(() => registry.prepare('push', { imageName: 'alpine', force: true })).toThrow(ValidationError);
    });
  });

  describe('execute', () => {
    it('should answer fatally for a kind nobody registered', async () => {
      const registry = new ExecutorRegistry().register(new ScriptedExecutor('push'));
      const context: ExecutionContext = {
        taskId: 'task-1',
        key: 'k',
        attempt: 1,
        deadline: new Date(),
        signal: new AbortController().signal,
        isCancelled: () => false,
        reportProgress: () => undefined,
        log: () => undefined,
      };

      expect(await registry.execute('build', {}, context)).toEqual({
        status: 'fatal',
        reason: 'No executor registered for kind "build"',
      });
      expect((await registry.execute('push', {}, context)).status).toBe('success');
    });
  });
});
