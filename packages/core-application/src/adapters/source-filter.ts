function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Names the relay must never pick up as payload: the trigger marker and the
 * manifest artifacts it writes itself (<prefix>-<seconds>[-<n>].json).
 */
export function createSourceFilter(options: { triggerFileName: string; manifestPrefix: string }) {
  const manifestName = new RegExp(`^${escapeRegExp(options.manifestPrefix)}-\\d+(?:-\\d+)?\\.json$`);

  return (name: string) => {
    if (name === options.triggerFileName) return true;
    if (manifestName.test(name)) return true;
    return false;
  };
}
