import { eq } from 'drizzle-orm';
import type { Database } from '../../db/index.js';
import { schema } from '../../db/index.js';
import type { Clock } from '../../lib/clock.js';
import { systemClock } from '../../lib/clock.js';
import { ValidationError } from '../../lib/errors.js';
import { logger } from '../../lib/logger.js';
import type { ModuleRegistry } from '../../modules/registry.js';
import type { ModuleDefaults, ModuleSettings } from '../../modules/types.js';
import { EMPTY_REFERENCE_DATA, ReferenceDataService, type ReferenceData } from '../reference-data/index.js';

export interface ModuleOverrides {
  models: Record<string, string>;
  prompts: Record<string, string>;
}

export interface ModuleConfigView {
  moduleKey: string;
  models: Record<string, string>;
  prompts: Record<string, string>;
  overrides: ModuleOverrides;
  updatedAt: string | null;
}

export interface ModuleConfigUpdate {
  models?: Record<string, string>;
  prompts?: Record<string, string>;
}

export class ResolvedSettings implements ModuleSettings {
  constructor(
    private readonly defaults: ModuleDefaults,
    private readonly overrides: ModuleOverrides,
    private readonly fallbackModel: string,
    readonly reference: ReferenceData = EMPTY_REFERENCE_DATA,
  ) {}

  model(slot: string): string {
    return this.overrides.models[slot] ?? this.defaults.models[slot] ?? this.fallbackModel;
  }

  prompt(key: string): string {
    const content = this.overrides.prompts[key] ?? this.defaults.prompts[key];
    if (content === undefined) throw new Error(`Unknown prompt key: ${key}`);
    return content;
  }

  models(): Record<string, string> {
    return Object.fromEntries(Object.keys(this.defaults.models).map(slot => [slot, this.model(slot)]));
  }

  prompts(): Record<string, string> {
    return Object.fromEntries(Object.keys(this.defaults.prompts).map(key => [key, this.prompt(key)]));
  }
}

/**
 * Admin-editable model and prompt selection per module. Overrides are read
 * from the database once per job run; a module's defaults fill every gap.
 */
export class ModuleConfigService {
  constructor(
    private readonly db: Database,
    private readonly registry: ModuleRegistry,
    private readonly defaultModel: string,
    private readonly clock: Clock = systemClock,
    private readonly referenceData: ReferenceDataService = new ReferenceDataService(db, clock),
  ) {}

  /** Settings for one run, including a snapshot of the reference tables. */
  async settingsFor(moduleKey: string): Promise<ResolvedSettings> {
    const module = this.registry.require(moduleKey);
    const { overrides } = await this.loadOverrides(moduleKey);
    const reference = await this.referenceData.snapshot();
    return new ResolvedSettings(module.defaults, overrides, this.defaultModel, reference);
  }

  async getConfig(moduleKey: string): Promise<ModuleConfigView> {
    const module = this.registry.require(moduleKey);
    const { overrides, updatedAt } = await this.loadOverrides(moduleKey);
    const settings = new ResolvedSettings(module.defaults, overrides, this.defaultModel);

    return {
      moduleKey,
      models: settings.models(),
      prompts: settings.prompts(),
      overrides,
      updatedAt: updatedAt?.toISOString() ?? null,
    };
  }

  /** Merges the update into the stored overrides. Only slots and prompts the module defines are accepted. */
  async updateConfig(moduleKey: string, update: ModuleConfigUpdate): Promise<ModuleConfigView> {
    const module = this.registry.require(moduleKey);

    const unknownModels = Object.keys(update.models ?? {}).filter(slot => !(slot in module.defaults.models));
    const unknownPrompts = Object.keys(update.prompts ?? {}).filter(key => !(key in module.defaults.prompts));
    if (unknownModels.length > 0 || unknownPrompts.length > 0) {
      throw new ValidationError(
        `Unknown configuration keys for ${moduleKey}: ${[...unknownModels, ...unknownPrompts].join(', ')}`,
      );
    }

    const { overrides } = await this.loadOverrides(moduleKey);
    const models = { ...overrides.models, ...update.models };
    const prompts = { ...overrides.prompts, ...update.prompts };
    const now = this.clock();

    await this.db
      .insert(schema.moduleConfigs)
      .values({ moduleKey, models, prompts, updatedAt: now })
      .onConflictDoUpdate({
        target: schema.moduleConfigs.moduleKey,
        set: { models, prompts, updatedAt: now },
      });

    logger.info({ moduleKey, models: Object.keys(models), prompts: Object.keys(prompts) }, 'Module config updated');
    return this.getConfig(moduleKey);
  }

  async resetConfig(moduleKey: string): Promise<ModuleConfigView> {
    this.registry.require(moduleKey);
    await this.db.delete(schema.moduleConfigs).where(eq(schema.moduleConfigs.moduleKey, moduleKey));
    logger.info({ moduleKey }, 'Module config reset to defaults');
    return this.getConfig(moduleKey);
  }

  private async loadOverrides(moduleKey: string): Promise<{ overrides: ModuleOverrides; updatedAt: Date | null }> {
    const [row] = await this.db
      .select()
      .from(schema.moduleConfigs)
      .where(eq(schema.moduleConfigs.moduleKey, moduleKey))
      .limit(1);

    return {
      overrides: { models: row?.models ?? {}, prompts: row?.prompts ?? {} },
      updatedAt: row?.updatedAt ?? null,
    };
  }
}
