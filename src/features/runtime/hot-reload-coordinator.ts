/**
 * Hot Reload Coordinator
 *
 * Stages a new preset off the render path and hands it over at a frame
 * boundary. At most one request is pending: a newer request supersedes an
 * older one, whose result is dropped when it arrives.
 */

import { createLogger } from '@/lib/logger';

const log = createLogger('HotReload');

export interface StagedReload<R, T> {
  request: R;
  staged: T;
}

export interface HotReloadOptions<R, T> {
  /** Parse, validate and prepare everything that needs no GPU */
  stage: (request: R) => Promise<T>;
  /** Staging of the latest notification failed; the active graph keeps running */
  onError: (request: R, error: unknown) => void;
}

export class HotReloadCoordinator<R, T> {
  private options: HotReloadOptions<R, T>;
  private generation = 0;
  private inFlight: Promise<void> | null = null;
  private ready: StagedReload<R, T> | null = null;
  private latest: R | null = null;
  private disposed = false;

  constructor(options: HotReloadOptions<R, T>) {
    this.options = options;
  }

  /** Whether a request is being staged or waits for the next frame boundary */
  get pending(): boolean {
    return this.inFlight !== null || this.ready !== null;
  }

  /**
   * Stage a request. The returned promise settles with the staging result
   * even when a newer request supersedes it.
   */
  submit(request: R): Promise<T> {
    if (this.disposed) {
      return Promise.reject(new Error('Hot reload coordinator is disposed'));
    }

    const generation = ++this.generation;
    this.latest = request;
    // A superseded result is never activated
    this.ready = null;

    const staging = this.options.stage(request);
    const run = staging
      .then(
        (staged) => {
          if (!this.isCurrent(generation)) {
            log.debug('Dropping a superseded staged preset');
            return;
          }
          this.ready = { request, staged };
        },
        () => undefined
      )
      .finally(() => {
        if (this.inFlight === run) this.inFlight = null;
      });
    this.inFlight = run;

    return staging;
  }

  /**
   * Flag a change without waiting; failures go to onError
   */
  notify(request: R): void {
    if (this.disposed) return;

    const generation = this.generation + 1;
    this.submit(request).catch((error: unknown) => {
      if (!this.isCurrent(generation)) return;
      log.warn('Reload rejected; keeping the active preset');
      this.options.onError(request, error);
    });
  }

  /** Whether no newer request was submitted after this one */
  isLatest(request: R): boolean {
    return !this.disposed && this.latest === request;
  }

  /**
   * Take the staged request, if one is ready. Called at a frame boundary.
   */
  takeReady(): StagedReload<R, T> | null {
    const ready = this.ready;
    this.ready = null;
    return ready;
  }

  /**
   * Resolves once no staging is in flight
   */
  async whenSettled(): Promise<void> {
    while (this.inFlight) {
      await this.inFlight;
    }
  }

  dispose(): void {
    this.disposed = true;
    this.ready = null;
    this.latest = null;
  }

  private isCurrent(generation: number): boolean {
    return generation === this.generation && !this.disposed;
  }
}
