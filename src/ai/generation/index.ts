/**
 * Support Knowledge Assistant - Generation Module
 */

export * from './types';
export * from './prompts';
export * from './actionRules';
export * from './ResponseGenerator';
