export interface TriggerWatcher {
  /**
   * Resolves with true once the marker exists, or with false when the
   * signal aborts first.
   */
  waitForMarker(markerPath: string, signal?: AbortSignal): Promise<boolean>;
}
