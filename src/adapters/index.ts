/**
 * TableKit Adapters
 * 
 * Exports all handle implementations for different database systems.
 */

// Export base types
export * from './types';

// Export Drizzle adapter
export * from './drizzle'; 
