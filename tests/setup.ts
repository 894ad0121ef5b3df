/**
 * Vitest setup file
 * Runs before all tests
 */

// Required for tsyringe DI decorators
import 'reflect-metadata';
