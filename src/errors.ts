/** Base class for failures the CLI reports with a message and a non-zero exit code. */
export class ApidocSyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A version string that is not a dot-separated list of non-negative integers. */
export class InvalidVersionError extends ApidocSyncError {
  readonly version: string;

  constructor(version: string, where?: string) {
    super(where ? `Invalid API version "${version}" in ${where}` : `Invalid API version "${version}"`);
    this.version = version;
  }
}

/** apidoc.json exists but cannot be used as a metadata record. */
export class MetadataFileError extends ApidocSyncError {
  readonly filePath: string;

  constructor(filePath: string, detail: string, options?: { cause?: unknown }) {
    super(`Cannot update ${filePath}: ${detail}`, options);
    this.filePath = filePath;
  }
}
