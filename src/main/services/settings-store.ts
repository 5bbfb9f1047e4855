/**
 * User settings service.
 * Defaults merged over the stored values; persisted to {DataDir}/settings.json.
 */
import { DEFAULT_SETTINGS, type UserSettings } from '@shared/settings';
import {
  SettingsPatchSchema,
  StoredSettingsSchema,
  UserSettingsSchema,
  type SettingsPatch,
} from '@shared/zod-schemas';
import { createLogger } from '../logger';
import { atomicWriteFile, readFileSafeAsync, withFileLock } from './file-io';

const logger = createLogger('settings');

function definedOnly(patch: SettingsPatch): Record<string, unknown> {
  return Object.fromEntries(Object.entries(patch).filter(([, value]) => value !== undefined));
}

export class SettingsStore {
  private readonly filePath: string;
  private settings: UserSettings = DEFAULT_SETTINGS;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  /**
   * Load settings. A missing file is created with the defaults; a corrupt one is logged
   * and the defaults are used without overwriting it.
   */
  async load(): Promise<UserSettings> {
    const content = await readFileSafeAsync(this.filePath);
    if (content === null) {
      this.settings = DEFAULT_SETTINGS;
      await this.save();
      return this.settings;
    }
    try {
      const parsed: unknown = JSON.parse(content.toString('utf-8'));
      const result = StoredSettingsSchema.safeParse(parsed);
      if (result.success) {
        this.settings = UserSettingsSchema.parse({ ...DEFAULT_SETTINGS, ...definedOnly(result.data) });
      } else {
        logger.warn(`settings.json has invalid values, using defaults: ${result.error.message}`);
        this.settings = DEFAULT_SETTINGS;
      }
    } catch (err) {
      logger.warn(
        `Failed to parse settings.json, using defaults: ${err instanceof Error ? err.message : String(err)}`,
      );
      this.settings = DEFAULT_SETTINGS;
    }
    return this.settings;
  }

  private async save(): Promise<void> {
    const snapshot = JSON.stringify(this.settings, null, 2);
    await withFileLock(this.filePath, () => atomicWriteFile(this.filePath, snapshot));
  }

  getSettings(): UserSettings {
    return this.settings;
  }

  getSetting<K extends keyof UserSettings>(key: K): UserSettings[K] {
    return this.settings[key];
  }

  /**
   * Merge a validated partial update over the current settings and persist.
   */
  async saveSettings(patch: SettingsPatch): Promise<UserSettings> {
    this.settings = UserSettingsSchema.parse({ ...this.settings, ...definedOnly(patch) });
    await this.save();
    logger.info(`Saved settings (${Object.keys(definedOnly(patch)).join(', ')})`);
    return this.settings;
  }

  async setSetting<K extends keyof UserSettings>(
    key: K,
    value: UserSettings[K],
  ): Promise<UserSettings> {
    return this.saveSettings(SettingsPatchSchema.parse({ [key]: value }));
  }
}
