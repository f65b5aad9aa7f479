// Core package exports

export * from './errors';
export * from './ports';
export * from './json/value';
export * from './json/codec';
export * from './metadata/paths';
export * from './metadata/time';
export * from './metadata/dist';
export * from './metadata/package-info';
export * from './metadata/packages-document';
export * from './metadata/provider-rewriter';
export * from './metadata/provider-builder';
export * from './metadata/merge';
export * from './metadata/dist-url';
export * from './extractor/zip-manifest-extractor';
export * from './processor';
export * from './utils/logger';
