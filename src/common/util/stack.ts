const kUnimportantFrames = [
  /[\\/]node_modules[\\/]/,
  /\(node:internal[\\/]/,
  /^\s*at node:internal[\\/]/,
];

/**
 * Returns the frames of `stack` (dropping its leading message lines) without those in
 * node_modules or Node's internals. If that leaves nothing, all frames are kept.
 */
export function extractImportantStackTrace(stack: string): string {
  const lines = stack.split('\n');
  const frames = lines.filter(l => /^\s*at /.test(l));
  const important = frames.filter(l => !kUnimportantFrames.some(re => re.test(l)));
  return (important.length ? important : frames).join('\n');
}
