/**
 * Wallpaper Runtime
 *
 * Drives one render backend: stages presets, activates them at frame
 * boundaries, renders or holds frames on each tick and presents the image
 * pass onto every monitor.
 *
 * Tick order:
 * 1. activate a staged preset, if one is ready
 * 2. ask the scheduler whether to render or hold
 * 3. render: upload key state, draw every canvas, commit all slots, advance time
 * 4. present each canvas's image through its monitor mappings
 */

import { InputState, KEY_COUNT, KEYBOARD_ROWS } from '@/features/input';
import { canvasSignature, resolveLayout } from '@/features/layout/layout-resolver';
import type { CanvasPlan, Monitor } from '@/features/layout/types';
import { TimeSource } from '@/features/player/clock/time-source';
import { FrameScheduler } from '@/features/player/frame-scheduler';
import { readPresetFile } from '@/features/preset/services/preset-files';
import { watchPresetFile, type WatchFunction } from '@/features/preset/services/preset-watcher';
import type { Preset, RenderPassId } from '@/features/preset/types';
import { AssetTextures, fetchAssets } from '@/features/gpu/assets/asset-textures';
import type { AssetProvider, FetchedAsset } from '@/features/gpu/assets/types';
import type { RenderBackend, TextureHandle } from '@/features/gpu/backend/types';
import { buildRenderGraph } from '@/features/gpu/graph/graph-builder';
import { PassDrawError, PassExecutor, compileGraph } from '@/features/gpu/graph/pass-executor';
import { ResourceSlots } from '@/features/gpu/graph/resource-slots';
import type { RenderGraph } from '@/features/gpu/graph/types';
import { config } from '@/lib/config';
import { RuntimeGPUError, isShaderPaperError } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import { HotReloadCoordinator } from './hot-reload-coordinator';
import { createStatusStore, type OverlayText, type StatusStore } from './stores/status-store';

const log = createLogger('WallpaperRuntime');

export interface WallpaperRuntimeOptions {
  backend: RenderBackend;
  monitors?: readonly Monitor[];
  /** Pixel source for texture, cubemap and volume inputs */
  assets?: AssetProvider | null;
  maxConsecutiveGpuErrors?: number;
  overlayDurationMs?: number;
  reloadDebounceMs?: number;
  /** Directory watcher used by watchPreset */
  watch?: WatchFunction;
  /** Clock for iDate */
  now?: () => Date;
}

export type TickAction = 'render' | 'hold' | 'skip';

/** What one tick presented */
export interface PresentedFrame {
  action: TickAction;
  /** iFrame of the frame rendered this tick; null when none was */
  frame: number | null;
  /** Simulation time of the newest rendered frame */
  time: number;
  /** Weight of the newest frame against the one before it */
  blend: number;
  /** Monitors presented to */
  presented: number;
  /** A staged preset became active at the start of this tick */
  activated: boolean;
  /** Set when the tick dropped its frame, or after a fatal failure */
  error: RuntimeGPUError | null;
}

type LoadRequest = { kind: 'preset'; preset: Preset } | { kind: 'file'; path: string };

interface StagedPreset {
  preset: Preset;
  graph: RenderGraph;
  assets: FetchedAsset[];
  path: string | null;
}

interface CanvasTarget {
  plan: CanvasPlan;
  slots: ResourceSlots;
  /** Frames rendered into the slots since they were allocated */
  framesRendered: number;
  /** Whether the image back target still holds the frame before the newest */
  previousValid: boolean;
}

interface PreparedGraph {
  assets: AssetTextures;
  executor: PassExecutor;
  canvases: CanvasTarget[];
  compileWarnings: string[];
}

interface ActiveGraph {
  preset: Preset;
  graph: RenderGraph;
  path: string | null;
  executor: PassExecutor;
  assets: AssetTextures;
  canvases: CanvasTarget[];
}

export class WallpaperRuntime {
  readonly input = new InputState();
  readonly status: StatusStore = createStatusStore();

  private backend: RenderBackend;
  private assetProvider: AssetProvider | null;
  private maxConsecutiveGpuErrors: number;
  private overlayDurationSeconds: number;
  private reloadDebounceMs: number;
  private watch: WatchFunction | undefined;
  private now: () => Date;

  private monitors: Monitor[];
  private reload: HotReloadCoordinator<LoadRequest, StagedPreset>;
  private active: ActiveGraph | null = null;
  private time = new TimeSource();
  private scheduler = new FrameScheduler({ intervalBetweenFrames: 0, crossfadeOverlapRatio: 0 });
  private keyboardTexture: TextureHandle;

  private wallTime = 0;
  private overlayUntil = 0;
  private consecutiveGpuErrors = 0;
  private fatalError: RuntimeGPUError | null = null;
  private watchers: Set<() => void> = new Set();
  private disposed = false;

  constructor(options: WallpaperRuntimeOptions) {
    this.backend = options.backend;
    this.assetProvider = options.assets ?? null;
    this.maxConsecutiveGpuErrors = options.maxConsecutiveGpuErrors ?? config.render.maxConsecutiveGpuErrors;
    this.overlayDurationSeconds = (options.overlayDurationMs ?? config.overlayDurationMs) / 1000;
    this.reloadDebounceMs = options.reloadDebounceMs ?? config.reloadDebounceMs;
    this.watch = options.watch;
    this.now = options.now ?? (() => new Date());
    this.monitors = [...(options.monitors ?? [])];

    this.reload = new HotReloadCoordinator<LoadRequest, StagedPreset>({
      stage: (request) => this.stage(request),
      onError: (request, error) => this.reportRejected(request, error),
    });

    this.keyboardTexture = this.backend.createTexture({
      kind: '2d',
      width: KEY_COUNT,
      height: KEYBOARD_ROWS,
      format: 'r8unorm',
    });
  }

  // ============================================
  // Getters
  // ============================================

  /** The graph frames are rendered from; null before the first activation */
  get graph(): RenderGraph | null {
    return this.active?.graph ?? null;
  }

  get canvases(): CanvasPlan[] {
    return this.active?.canvases.map((canvas) => canvas.plan) ?? [];
  }

  /** Slots of a canvas of the active graph, for inspection */
  slotsOf(canvasId: string): ResourceSlots | null {
    return this.active?.canvases.find((canvas) => canvas.plan.id === canvasId)?.slots ?? null;
  }

  /** Whether a preset is being staged or waits for the next tick */
  get reloadPending(): boolean {
    return this.reload.pending;
  }

  // ============================================
  // Loading
  // ============================================

  /**
   * Stage a preset. It becomes active at the start of the next tick unless a
   * newer load or reload supersedes it.
   * @throws ConfigError or BuildError when the preset cannot be built
   */
  async load(preset: Preset): Promise<RenderGraph> {
    this.assertUsable();
    const staged = await this.submit({ kind: 'preset', preset });
    return staged.graph;
  }

  /**
   * Read, validate and stage a preset file
   */
  async loadFile(filePath: string): Promise<RenderGraph> {
    this.assertUsable();
    const staged = await this.submit({ kind: 'file', path: filePath });
    return staged.graph;
  }

  /**
   * Flag a changed preset file. A failed reload keeps the active preset and
   * is reported through the status store.
   */
  notifyPresetChanged(filePath: string): void {
    if (this.disposed) return;
    log.info(`Preset changed: ${filePath}`);
    this.reload.notify({ kind: 'file', path: filePath });
    this.status.getState().setReloadPending(true);
  }

  /**
   * Reload a preset file whenever it changes on disk
   * @returns a function that stops watching
   */
  watchPreset(filePath: string): () => void {
    this.assertUsable();
    const stop = watchPresetFile(filePath, (changed) => this.notifyPresetChanged(changed), {
      debounceMs: this.reloadDebounceMs,
      watch: this.watch,
    });
    const close = () => {
      if (this.watchers.delete(close)) stop();
    };
    this.watchers.add(close);
    return close;
  }

  /** Resolves once no preset is being staged */
  whenSettled(): Promise<void> {
    return this.reload.whenSettled();
  }

  private async submit(request: LoadRequest): Promise<StagedPreset> {
    this.status.getState().setReloadPending(true);
    try {
      return await this.reload.submit(request);
    } catch (error) {
      // A superseded load must not overwrite the status of a newer one
      if (this.reload.isLatest(request)) {
        this.reportRejected(request, error);
      }
      throw error;
    }
  }

  private async stage(request: LoadRequest): Promise<StagedPreset> {
    const preset = request.kind === 'file' ? await readPresetFile(request.path) : request.preset;
    const graph = buildRenderGraph(preset);
    const assets = await fetchAssets(graph, this.assetProvider);
    return { preset, graph, assets, path: request.kind === 'file' ? request.path : null };
  }

  private reportRejected(request: LoadRequest, error: unknown): void {
    const source = request.kind === 'file' ? request.path : `preset "${request.preset.metadata.id}"`;
    const code = isShaderPaperError(error) ? error.code : 'Error';
    const message = error instanceof Error ? error.message : String(error);
    log.error(`Cannot load ${source}: ${message}`);

    this.status.getState().setLastError({ code, message });
  }

  // ============================================
  // Monitors
  // ============================================

  /**
   * Replace the monitor set. Canvases whose size changes are reallocated and
   * the frame counter restarts; unchanged ones keep their content.
   */
  setMonitors(monitors: readonly Monitor[]): void {
    this.assertUsable();
    this.monitors = [...monitors];
    log.debug(`Monitors: ${monitors.map((monitor) => monitor.name).join(', ') || '(none)'}`);

    const active = this.active;
    if (!active) return;

    const before = canvasSignature(active.canvases.map((canvas) => canvas.plan));
    active.canvases = this.allocateCanvases(active.graph, active.canvases);
    if (canvasSignature(active.canvases.map((canvas) => canvas.plan)) !== before) {
      this.restartFrames();
    }
  }

  private allocateCanvases(graph: RenderGraph, previous: readonly CanvasTarget[]): CanvasTarget[] {
    const passes: RenderPassId[] = graph.passes.map((pass) => pass.id);
    const plans = resolveLayout(this.monitors, graph.settings);
    const reused = new Set<CanvasTarget>();

    const created: ResourceSlots[] = [];
    const canvases: CanvasTarget[] = [];
    try {
      for (const plan of plans) {
        const size = { width: plan.width, height: plan.height };
        const match = previous.find(
          (canvas) => !reused.has(canvas) && canvas.plan.id === plan.id && samePasses(canvas.slots.passes, passes)
        );
        if (!match) {
          const slots = new ResourceSlots(this.backend, size, passes);
          created.push(slots);
          canvases.push({ plan, slots, framesRendered: 0, previousValid: false });
          continue;
        }
        reused.add(match);
        canvases.push(
          match.slots.resize(size)
            ? { plan, slots: match.slots, framesRendered: 0, previousValid: false }
            : { ...match, plan }
        );
      }
    } catch (error) {
      for (const slots of created) {
        slots.dispose();
      }
      throw error;
    }

    for (const canvas of previous) {
      if (!reused.has(canvas)) canvas.slots.dispose();
    }
    return canvases;
  }

  // ============================================
  // Frame loop
  // ============================================

  /**
   * Advance by the wall time since the previous tick and present a frame.
   * GPU failures are reported in the result, never thrown.
   */
  tick(wallDeltaSeconds: number): PresentedFrame {
    this.assertUsable();
    if (!Number.isFinite(wallDeltaSeconds) || wallDeltaSeconds < 0) {
      throw new RangeError(`Invalid tick delta: ${wallDeltaSeconds}`);
    }

    this.wallTime += wallDeltaSeconds;
    const activated = this.activateStaged();
    this.updateOverlay();

    const pending = this.reload.pending;
    if (this.status.getState().reloadPending !== pending) {
      this.status.getState().setReloadPending(pending);
    }

    const active = this.active;
    if (!active || active.canvases.length === 0 || this.fatalError) {
      return this.skipped(activated);
    }

    const decision = this.scheduler.tick(wallDeltaSeconds);
    let action: TickAction = 'hold';
    let frame: number | null = null;
    let error: RuntimeGPUError | null = null;

    this.backend.beginFrame();
    try {
      if (decision.action === 'render') {
        const outcome = this.renderFrame(active, decision.elapsed);
        if (outcome instanceof RuntimeGPUError) {
          error = outcome;
        } else {
          action = 'render';
          frame = outcome;
        }
      }

      // Without a retained previous frame the newest is shown alone
      const blend = active.canvases.some((canvas) => canvas.previousValid) ? this.scheduler.blend : 1;
      const presented = this.fatalError ? 0 : this.present(active, blend);
      this.status.getState().setSchedulerState(this.scheduler.state);

      return { action, frame, time: this.time.time, blend, presented, activated, error };
    } finally {
      this.backend.endFrame();
    }
  }

  /**
   * Draw every canvas. Nothing is committed unless all of them succeed.
   * @returns the rendered iFrame, or the error the frame was dropped for
   */
  private renderFrame(active: ActiveGraph, elapsed: number): number | RuntimeGPUError {
    const timeState = this.time.peekNext(elapsed);
    const date = this.now();
    const scale = active.graph.settings.resolutionScale;

    try {
      try {
        this.backend.uploadPixels(this.keyboardTexture, this.input.keyboard.texels());
      } catch (error) {
        throw new PassDrawError('keyboard', error);
      }

      for (const canvas of active.canvases) {
        active.executor.execute(canvas.slots, {
          time: timeState,
          mouse: this.input.mouse.sample(canvas.plan.bounds, scale),
          date,
        });
      }
    } catch (error) {
      if (!(error instanceof PassDrawError)) throw error;
      return this.dropFrame(active, error);
    }

    for (const canvas of active.canvases) {
      canvas.slots.commitAll();
      canvas.previousValid = canvas.framesRendered > 0;
      canvas.framesRendered++;
    }
    this.time.advance(elapsed);
    this.scheduler.rendered();
    this.input.endFrame();

    if (this.consecutiveGpuErrors > 0) {
      log.info(`Rendering recovered after ${this.consecutiveGpuErrors} dropped frame(s)`);
    }
    this.consecutiveGpuErrors = 0;
    this.status.getState().setFrameStats({
      frame: timeState.frame,
      time: timeState.time,
      frameRate: this.time.frameRate,
    });
    return timeState.frame;
  }

  private dropFrame(active: ActiveGraph, failure: PassDrawError): RuntimeGPUError {
    this.consecutiveGpuErrors++;
    const fatal = this.consecutiveGpuErrors >= this.maxConsecutiveGpuErrors;
    const error = new RuntimeGPUError(failure.pass, failure.failure, this.consecutiveGpuErrors, fatal);

    // Back targets may hold a partial frame
    for (const canvas of active.canvases) {
      canvas.previousValid = false;
    }
    this.scheduler.dropped();

    if (fatal) {
      this.fatalError = error;
      log.error(error.message);
    } else {
      log.warn(`Dropped frame: ${error.message}`);
    }
    this.status.getState().recordGpuError({ code: error.code, message: error.message }, fatal);
    return error;
  }

  private present(active: ActiveGraph, blend: number): number {
    let presented = 0;
    for (const canvas of active.canvases) {
      if (canvas.framesRendered === 0) continue;

      const previous = canvas.previousValid ? canvas.slots.writeTarget('image') : null;
      for (const layout of canvas.plan.monitors) {
        if (!layout.mapping) continue;
        this.backend.present({
          monitor: layout.monitor,
          mapping: layout.mapping,
          filter: active.graph.settings.filterMode,
          image: canvas.slots.current('image'),
          previous,
          blend: previous ? blend : 1,
        });
        presented++;
      }
    }
    return presented;
  }

  private skipped(activated: boolean): PresentedFrame {
    return {
      action: 'skip',
      frame: null,
      time: this.time.time,
      blend: 1,
      presented: 0,
      activated,
      error: this.fatalError,
    };
  }

  // ============================================
  // Activation
  // ============================================

  /**
   * Swap in a staged preset. The previous graph's resources are released
   * only once the new one is fully set up.
   */
  private activateStaged(): boolean {
    const ready = this.reload.takeReady();
    if (!ready) return false;

    const { preset, graph, assets: fetched, path } = ready.staged;
    const previous = this.active;
    const timing = { scale: this.time.timeScale, offset: this.time.timeOffset };
    let prepared: PreparedGraph;
    try {
      this.time.timeScale = graph.settings.timeScale;
      this.time.timeOffset = graph.settings.timeOffset;
      prepared = this.prepareGraph(graph, fetched, previous?.canvases ?? []);
    } catch (error) {
      this.time.timeScale = timing.scale;
      this.time.timeOffset = timing.offset;
      this.reportRejected(ready.request, error);
      return false;
    }
    const { assets, executor, canvases, compileWarnings } = prepared;

    if (previous) {
      previous.executor.dispose();
      previous.assets.dispose();
    }
    this.active = { preset, graph, path, executor, assets, canvases };

    this.scheduler.configure(graph.settings);
    this.restartFrames();
    this.consecutiveGpuErrors = 0;
    this.fatalError = null;
    this.overlayUntil = this.wallTime + this.overlayDurationSeconds;

    const warnings = [...graph.warnings, ...assets.warnings, ...compileWarnings];
    this.status.getState().setActivePreset(
      { id: preset.metadata.id, name: preset.metadata.name, author: preset.metadata.author, path },
      warnings
    );
    log.info(`Activated preset "${preset.metadata.id || preset.metadata.name || '(unnamed)'}" with ${graph.passes.length} pass(es)`);
    return true;
  }

  /**
   * GPU side of an activation; releases what it created when a step fails
   */
  private prepareGraph(
    graph: RenderGraph,
    fetched: readonly FetchedAsset[],
    previous: readonly CanvasTarget[]
  ): PreparedGraph {
    const assets = new AssetTextures(this.backend, fetched);
    try {
      const compiled = compileGraph(this.backend, graph);
      const executor = new PassExecutor(this.backend, compiled.passes, { assets, keyboard: this.keyboardTexture });
      try {
        const canvases = this.allocateCanvases(graph, previous);
        return { assets, executor, canvases, compileWarnings: compiled.errors.map((error) => error.message) };
      } catch (error) {
        executor.dispose();
        throw error;
      }
    } catch (error) {
      assets.dispose();
      throw error;
    }
  }

  private restartFrames(): void {
    this.time.resetFrame();
    this.scheduler.reset();
    for (const canvas of this.active?.canvases ?? []) {
      canvas.framesRendered = 0;
      canvas.previousValid = false;
    }
  }

  // ============================================
  // Overlay
  // ============================================

  /**
   * Name and author of the active preset during the few seconds after it
   * was activated; null otherwise or when both are empty
   */
  overlayText(): OverlayText | null {
    const active = this.active;
    if (!active || this.wallTime >= this.overlayUntil) return null;

    const { name, author } = active.preset.metadata;
    if (name === '' && author === '') return null;
    return { name, author };
  }

  private updateOverlay(): void {
    const overlay = this.overlayText();
    const current = this.status.getState().overlay;
    if (overlay?.name !== current?.name || overlay?.author !== current?.author) {
      this.status.getState().setOverlay(overlay);
    }
  }

  // ============================================
  // Teardown
  // ============================================

  /**
   * Release every GPU resource and stop watching. The backend itself stays
   * with its owner.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    for (const close of [...this.watchers]) {
      close();
    }
    this.reload.dispose();

    const active = this.active;
    this.active = null;
    if (active) {
      active.executor.dispose();
      active.assets.dispose();
      for (const canvas of active.canvases) {
        canvas.slots.dispose();
      }
    }
    this.backend.destroyTexture(this.keyboardTexture);
    this.status.getState().reset();
    log.debug('Disposed');
  }

  private assertUsable(): void {
    if (this.disposed) {
      throw new Error('Wallpaper runtime is disposed');
    }
  }
}

function samePasses(a: readonly RenderPassId[], b: readonly RenderPassId[]): boolean {
  return a.length === b.length && a.every((id, index) => id === b[index]);
}

export function createWallpaperRuntime(options: WallpaperRuntimeOptions): WallpaperRuntime {
  return new WallpaperRuntime(options);
}
