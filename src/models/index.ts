/**
 * Central export point for all models
 * Allows clean imports: import { Equity, Quote } from '@/models'
 */

export * from './Equity';
export * from './DirectoryEntry';
export * from './Quote';
export * from './Portfolio';
export * from './Performance';
export * from './AddEquityDraft';
