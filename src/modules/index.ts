import { graderModule } from './grader.js';
import { infoExtractModule } from './info-extract.js';
import { reviewerModule } from './reviewer.js';
import { summarizerModule } from './summarizer.js';
import { translatorModule } from './translator.js';
import { ModuleRegistry } from './registry.js';
import type { AnyToolModule } from './types.js';

export const defaultModules: AnyToolModule[] = [
  summarizerModule,
  translatorModule,
  graderModule,
  infoExtractModule,
  reviewerModule,
];

export function createDefaultRegistry(): ModuleRegistry {
  return new ModuleRegistry(defaultModules);
}

export { ModuleRegistry };
