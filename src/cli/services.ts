import * as defaultFs from 'node:fs/promises';
import { chore, type ChoreApp } from '../app.js';
import { configService } from '../config/index.js';
import type { ConfigService } from '../config/types.js';
import { importModule, type ModuleImporter } from './loader.js';

export interface Services {
  app: ChoreApp;
  config: ConfigService;
  fs: typeof defaultFs;
  importModule: ModuleImporter;
}

export function createServices(overrides: Partial<Services> = {}): Services {
  return {
    app: chore,
    config: configService,
    fs: defaultFs,
    importModule,
    ...overrides,
  };
}
