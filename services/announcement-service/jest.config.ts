import type { Config } from 'jest';

const config: Config = {
  preset: 'ts-jest',
  testEnvironment: 'node',
  forceExit: true,

  transform: {
    '^.+\\.ts$': [
      'ts-jest',
      {
        tsconfig: '<rootDir>/tsconfig.json',
      },
    ],
  },

  rootDir: '.',

  testMatch: ['<rootDir>/tests/**/*.test.ts'],

  // Fake clients keep their jest.fn implementations across tests
  clearMocks: true,

  collectCoverageFrom: [
    'src/**/*.ts',
    '!src/server.ts',
    '!src/**/*.d.ts',
  ],

  moduleNameMapper: {
    '^@/(.*)$': '<rootDir>/src/$1',
  },

  coverageDirectory: 'coverage',

  moduleFileExtensions: ['ts', 'js', 'json'],
};

export default config;
