/**
 * Core types for the spend-sentinel library
 *
 * Re-exports all types from domain-specific files in types/.
 */

export * from './types/index'
