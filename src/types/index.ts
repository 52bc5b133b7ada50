// Action metadata types
export * from './metadata.types';

// Common types
export * from './common.types';

// Commit grammar and classification types
export * from './commit.types';

// Configuration types
export * from './config.types';

// Context and runtime types
export * from './context.types';

// GitHub related types
export * from './github.types';

// Question flow types
export * from './questions.types';
