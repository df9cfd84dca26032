/**
 * Global test setup file for Vitest.
 *
 * This file is loaded before each test file.
 */

import { vi } from 'vitest'

// Silence console output in tests to reduce noise
// Individual tests can restore console methods if they need to test console output
vi.spyOn(console, 'info').mockImplementation(() => {})
vi.spyOn(console, 'warn').mockImplementation(() => {})
vi.spyOn(console, 'error').mockImplementation(() => {})
