// Contracts
export * from './contracts';

// Errors
export * from './errors';

// Tags
export * from './tags';

// Configuration
export * from './config';

// Database
export * from './db';

// Query
export * from './query';

// Filter
export * from './filter';

// Stats
export * from './stats';

// Bulk
export * from './bulk';

// Facade
export * from './tag-shelf';
