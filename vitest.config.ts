/**
 * @fileoverview Vitest configuration for the workspace
 *
 * @description
 * Runs every workspace's tests in one pass. Page views are server-rendered
 * with Hono's JSX runtime, so esbuild is pointed at it explicitly.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  esbuild: {
    jsx: 'automatic',
    jsxImportSource: 'hono/jsx',
  },
  test: {
    environment: 'node',
    include: ['apps/*/src/**/*.test.{ts,tsx}', 'packages/*/src/**/*.test.ts'],
    testTimeout: 30_000,
    hookTimeout: 60_000,
  },
})
