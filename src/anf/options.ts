// Transform options shared by the packed and array transforms

export interface TransformOptions {
  // Log one line per butterfly pass
  verbose: boolean;
}

export const DEFAULT_TRANSFORM_OPTIONS: TransformOptions = {
  verbose: false,
};

export function resolveOptions(options: Partial<TransformOptions> = {}): TransformOptions {
  return { ...DEFAULT_TRANSFORM_OPTIONS, ...options };
}

export function logPass(opts: TransformOptions, pass: number, numPasses: number, blockSize: number): void {
  if (opts.verbose) {
    console.log(`  pass ${pass + 1}/${numPasses}: block size ${blockSize}`);
  }
}
