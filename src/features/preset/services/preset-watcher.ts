/**
 * Preset File Watcher
 *
 * Watches the directory holding a preset so editors that save by renaming a
 * temporary file still trigger a change. Bursts of events are coalesced.
 */

import fs from 'fs';
import path from 'path';
import { config } from '@/lib/config';
import { createLogger } from '@/lib/logger';

const log = createLogger('PresetWatcher');

export type WatchListener = (event: string, filename: string | null) => void;

/** Starts watching a directory; matches the shape of fs.watch */
export type WatchFunction = (directory: string, listener: WatchListener) => { close(): void };

export interface PresetWatcherOptions {
  debounceMs?: number;
  watch?: WatchFunction;
}

const watchDirectory: WatchFunction = (directory, listener) => {
  const watcher = fs.watch(directory, (event, filename) => listener(event, filename));
  watcher.on('error', (error) => {
    log.error(`Watching ${directory} failed`, error);
  });
  return watcher;
};

/**
 * Call onChange with the preset path after it changes on disk
 * @returns a function that stops watching
 */
export function watchPresetFile(
  filePath: string,
  onChange: (filePath: string) => void,
  options: PresetWatcherOptions = {}
): () => void {
  const debounceMs = options.debounceMs ?? config.reloadDebounceMs;
  const watch = options.watch ?? watchDirectory;
  const target = path.basename(filePath);
  let timer: ReturnType<typeof setTimeout> | null = null;

  const watcher = watch(path.dirname(filePath), (event, filename) => {
    // Some platforms omit the file name; treat that as a possible change
    if (filename !== null && path.basename(filename) !== target) return;

    log.debug(`${event} ${filePath}`);
    if (timer !== null) clearTimeout(timer);
    timer = setTimeout(() => {
      timer = null;
      onChange(filePath);
    }, debounceMs);
  });

  return () => {
    if (timer !== null) clearTimeout(timer);
    timer = null;
    watcher.close();
  };
}
