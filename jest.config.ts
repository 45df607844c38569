import type { Config } from 'jest'

// Map .js imports to .ts files and handle aliases
const moduleNameMapper = {
  '^(\\.{1,2}/.*)\\.js$': '$1',
  '^@/(.*)\\.js$': '<rootDir>/src/$1',
  '^@/(.*)$': '<rootDir>/src/$1',
  '^@test/(.*)$': '<rootDir>/test/$1',
}

const moduleFileExtensions = ['ts', 'js', 'json']

const config: Config = {
  // Parallel test execution - use 50% of CPU cores locally, limit to 2 in CI
  maxWorkers: process.env.CI ? 2 : '50%',
  // Stop test execution on first failure in CI for faster feedback
  bail: process.env.CI ? 1 : 0,
  verbose: process.env.CI === 'true',

  projects: [
    {
      displayName: 'unit',
      preset: 'ts-jest',
      testEnvironment: 'node',
      moduleFileExtensions,
      rootDir: '.',
      testMatch: ['<rootDir>/test/unit/**/*.spec.ts'],
      testPathIgnorePatterns: ['<rootDir>/test/e2e/', '<rootDir>/dist/'],
      moduleNameMapper,
      modulePathIgnorePatterns: ['<rootDir>/dist'],
      // Hashing tests stream tens of MiB through sha256
      testTimeout: 10000,
    },
    {
      displayName: 'e2e',
      preset: 'ts-jest',
      testEnvironment: 'node',
      moduleFileExtensions,
      rootDir: '.',
      testMatch: ['<rootDir>/test/e2e/**/*.e2e-spec.ts'],
      moduleNameMapper,
      modulePathIgnorePatterns: ['<rootDir>/dist'],
      testTimeout: 30000,
    },
  ],
}

export default config
