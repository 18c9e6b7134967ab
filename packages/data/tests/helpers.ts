// Shared fixtures for data package tests
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { vi } from 'vitest';

const __dirname = dirname(fileURLToPath(import.meta.url));

export function fixturePath(name: string): string {
  return join(__dirname, 'fixtures', name);
}

// Silence and capture console output for one test
export function captureConsole() {
  return {
    log: vi.spyOn(console, 'log').mockImplementation(() => undefined),
    warn: vi.spyOn(console, 'warn').mockImplementation(() => undefined),
    error: vi.spyOn(console, 'error').mockImplementation(() => undefined)
  };
}
