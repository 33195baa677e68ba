export interface MediaResolution {
  /** Referenced file name to output-relative path. */
  readonly paths: ReadonlyMap<string, string>;
  readonly missing: readonly string[];
}

/**
 * Maps referenced media files to paths relative to the report. Implementations must not
 * write anything while resolving: the report may still fail to assemble.
 */
export interface MediaResolverPort {
  resolve(names: readonly string[]): Promise<MediaResolution>;
}
