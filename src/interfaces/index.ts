export * from './IEntryExpander';
export * from './IPathCanonicalizer';
export * from './IRemover';
export * from './IReporter';
export * from './IProfileLoader';
export * from './ICleanOrchestrator';
export * from './IPrompter';
