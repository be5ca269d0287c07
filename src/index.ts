// Public library surface.

export const VERSION = '0.1.0';

export * from './errors';
export * from './apidoc/commentExtractor';
export * from './apidoc/apiDetails';
export * from './apidoc/version';
export * from './apidoc/apiIndex';
export * from './apidoc/merge';
export * from './output/writeApidocJs';
export * from './output/apidocJson';
export * from './scan/sourceScanner';
export * from './scan/inventory';
export * from './report/runReport';
export * from './report/markdownReport';
export * from './report/writeReport';
export * from './util/deterministicJson';
export * from './core/generateApidoc';
