import { describe, it, expect, vi } from 'vitest';
import { HotReloadCoordinator } from './hot-reload-coordinator';

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('HotReloadCoordinator', () => {
  it('hands over a staged reload once', async () => {
    const coordinator = new HotReloadCoordinator({
      stage: async (path: string) => `built ${path}`,
      onError: vi.fn(),
    });

    coordinator.notify('a.toml');
    expect(coordinator.pending).toBe(true);
    expect(coordinator.takeReady()).toBe(null);

    await coordinator.whenSettled();

    expect(coordinator.takeReady()).toEqual({ request: 'a.toml', staged: 'built a.toml' });
    expect(coordinator.takeReady()).toBe(null);
    expect(coordinator.pending).toBe(false);
  });

  it('tells whether a request is still the latest', async () => {
    const coordinator = new HotReloadCoordinator<string, string>({
      stage: async (path) => path,
      onError: vi.fn(),
    });

    const first = coordinator.submit('one.toml');
    const second = coordinator.submit('two.toml');

    expect(coordinator.isLatest('one.toml')).toBe(false);
    expect(coordinator.isLatest('two.toml')).toBe(true);

    await Promise.all([first, second]);
    coordinator.dispose();

    expect(coordinator.isLatest('two.toml')).toBe(false);
  });

  it('keeps only the latest of overlapping reloads', async () => {
    const first = deferred<string>();
    const second = deferred<string>();
    const stage = vi.fn().mockReturnValueOnce(first.promise).mockReturnValueOnce(second.promise);
    const coordinator = new HotReloadCoordinator<string, string>({ stage, onError: vi.fn() });

    coordinator.notify('one.toml');
    coordinator.notify('two.toml');
    second.resolve('second');
    first.resolve('first');
    await coordinator.whenSettled();

    expect(coordinator.takeReady()).toEqual({ request: 'two.toml', staged: 'second' });
  });

  it('drops a ready reload when a newer one starts', async () => {
    const later = deferred<string>();
    const stage = vi.fn().mockResolvedValueOnce('early').mockReturnValueOnce(later.promise);
    const coordinator = new HotReloadCoordinator<string, string>({ stage, onError: vi.fn() });

    coordinator.notify('a.toml');
    await coordinator.whenSettled();
    coordinator.notify('a.toml');

    expect(coordinator.takeReady()).toBe(null);
    later.resolve('late');
    await coordinator.whenSettled();
    expect(coordinator.takeReady()?.staged).toBe('late');
  });

  it('reports a failed staging of the latest notification', async () => {
    const onError = vi.fn();
    const failure = new Error('Malformed TOML');
    const coordinator = new HotReloadCoordinator<string, string>({
      stage: async () => {
        throw failure;
      },
      onError,
    });

    coordinator.notify('bad.toml');
    await coordinator.whenSettled();

    expect(onError).toHaveBeenCalledWith('bad.toml', failure);
    expect(coordinator.takeReady()).toBe(null);
  });

  it('ignores failures of superseded reloads', async () => {
    const first = deferred<string>();
    const onError = vi.fn();
    const stage = vi.fn().mockReturnValueOnce(first.promise).mockResolvedValueOnce('ok');
    const coordinator = new HotReloadCoordinator<string, string>({ stage, onError });

    coordinator.notify('a.toml');
    coordinator.notify('a.toml');
    first.reject(new Error('stale'));
    await coordinator.whenSettled();

    expect(onError).not.toHaveBeenCalled();
    expect(coordinator.takeReady()?.staged).toBe('ok');
  });

  it('resolves a submitted request with its staged value', async () => {
    const coordinator = new HotReloadCoordinator<string, number>({
      stage: async (path: string) => path.length,
      onError: vi.fn(),
    });

    await expect(coordinator.submit('abc')).resolves.toBe(3);
    expect(coordinator.takeReady()).toEqual({ request: 'abc', staged: 3 });
  });

  it('rejects a submitted request without reporting it', async () => {
    const onError = vi.fn();
    const coordinator = new HotReloadCoordinator<string, number>({
      stage: async () => {
        throw new Error('invalid');
      },
      onError,
    });

    await expect(coordinator.submit('x')).rejects.toThrow('invalid');
    await coordinator.whenSettled();
    expect(onError).not.toHaveBeenCalled();
    expect(coordinator.pending).toBe(false);
  });

  it('stops accepting reloads once disposed', async () => {
    const stage = vi.fn(async () => 'x');
    const coordinator = new HotReloadCoordinator<string, string>({ stage, onError: vi.fn() });

    coordinator.dispose();
    coordinator.notify('a.toml');
    await coordinator.whenSettled();

    expect(stage).not.toHaveBeenCalled();
    await expect(coordinator.submit('a.toml')).rejects.toThrow('Hot reload coordinator is disposed');
    expect(coordinator.takeReady()).toBe(null);
  });
});
