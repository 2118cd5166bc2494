import path from "node:path";
import { promises as fs } from "node:fs";
import { DEFAULT_SETTINGS } from "../../shared/constants.js";
import type { AppSettings } from "../../shared/types.js";
import { sanitizeAppSettings } from "./settings-utils.js";

const SETTINGS_FILE = "config.json";

export class ConfigStore {
  private readonly configPath: string;
  private readonly defaults: AppSettings;

  public constructor(dataDir: string) {
    this.configPath = path.join(dataDir, SETTINGS_FILE);
    this.defaults = { ...DEFAULT_SETTINGS };
  }

  public getDefaults(): AppSettings {
    return {
      ...this.defaults
    };
  }

  public async load(): Promise<AppSettings> {
    let data: string;
    try {
      data = await fs.readFile(this.configPath, "utf8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== "ENOENT") {
        console.warn(`Unable to read settings from ${this.configPath}, using defaults:`, error);
      }
      return this.getDefaults();
    }

    try {
      const parsed: unknown = JSON.parse(data);
      if (!parsed || typeof parsed !== "object") {
        return this.getDefaults();
      }
      return sanitizeAppSettings(parsed, this.defaults);
    } catch (error) {
      console.warn(`Settings file ${this.configPath} is not valid JSON, using defaults:`, error);
      return this.getDefaults();
    }
  }

  public async save(next: AppSettings): Promise<void> {
    const validated = sanitizeAppSettings(next, this.defaults);
    await fs.mkdir(path.dirname(this.configPath), { recursive: true });
    await fs.writeFile(this.configPath, JSON.stringify(validated, null, 2), "utf8");
  }

  public getPath(): string {
    return this.configPath;
  }
}
