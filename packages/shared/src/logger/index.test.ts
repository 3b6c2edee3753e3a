import { describe, it, expect, afterEach } from 'vitest';
import { createChildLogger, getLogger, resetLogger } from './index.js';

describe('logger', () => {
  afterEach(() => {
    process.env.LOG_LEVEL = 'silent';
    resetLogger();
  });

  it('should take its level from LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'warn';
    resetLogger();

    expect(getLogger().level).toBe('warn');
  });

  it('should fall back to info for unknown levels', () => {
    process.env.LOG_LEVEL = 'verbose';
    resetLogger();

    expect(getLogger().level).toBe('info');
  });

  it('should bind the component on child loggers', () => {
    const child = createChildLogger({ component: 'TimelineBuilder' });

    expect(child.bindings()).toEqual(expect.objectContaining({ component: 'TimelineBuilder' }));
  });

  it('should reuse the singleton until reset', () => {
    expect(getLogger()).toBe(getLogger());
  });
});
