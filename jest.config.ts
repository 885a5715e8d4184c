import type { Config } from 'jest';

const config: Config = {
  forceExit: true,
  projects: ['<rootDir>/services/announcement-service'],
};

export default config;
