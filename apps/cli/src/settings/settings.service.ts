import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEFAULT_SETTINGS, RunSettings } from '@hostfan/shared';
import { readFile } from 'fs/promises';
import { load, YAMLException } from 'js-yaml';
import { z } from 'zod';
import { errorMessage, InvalidOptionError } from '../common/errors';

export const SETTINGS_FILE = Symbol('SETTINGS_FILE');

const SettingsSchema = z
  .object({
    connectTimeoutSeconds: z.coerce.number().int().min(1).max(600).default(DEFAULT_SETTINGS.connectTimeoutSeconds),
    commandTimeoutSeconds: z.coerce.number().int().min(0).max(86400).default(DEFAULT_SETTINGS.commandTimeoutSeconds),
    hostKeyChecking: z.enum(['yes', 'accept-new', 'no']).default(DEFAULT_SETTINGS.hostKeyChecking),
    sshBinary: z.string().min(1).default(DEFAULT_SETTINGS.sshBinary),
    remoteCommand: z.string().min(1).default(DEFAULT_SETTINGS.remoteCommand),
    user: z.string().min(1).optional(),
    port: z.coerce.number().int().min(1).max(65535).optional(),
    identityFile: z.string().min(1).optional(),
  })
  .strict();

export type Settings = z.infer<typeof SettingsSchema>;
export type SettingsOverrides = { [K in keyof RunSettings]?: unknown };

const ENV_KEYS: Record<keyof RunSettings, string> = {
  connectTimeoutSeconds: 'HOSTFAN_CONNECT_TIMEOUT',
  commandTimeoutSeconds: 'HOSTFAN_COMMAND_TIMEOUT',
  hostKeyChecking: 'HOSTFAN_HOST_KEY_CHECKING',
  sshBinary: 'HOSTFAN_SSH_BINARY',
  remoteCommand: 'HOSTFAN_REMOTE_COMMAND',
  user: 'HOSTFAN_SSH_USER',
  port: 'HOSTFAN_SSH_PORT',
  identityFile: 'HOSTFAN_IDENTITY_FILE',
};

/**
 * Resolves run settings from, in increasing priority: defaults, the YAML
 * config file, HOSTFAN_* environment variables, command-line overrides.
 */
@Injectable()
export class SettingsService {
  private readonly logger = new Logger(SettingsService.name);

  constructor(
    private readonly config: ConfigService,
    @Inject(SETTINGS_FILE) private readonly configFile: string | null,
  ) {}

  async resolve(overrides: SettingsOverrides = {}): Promise<Settings> {
    const fromFile = await this.readConfigFile();
    const fromEnv = Object.fromEntries(
      Object.entries(ENV_KEYS).map(([key, envName]) => [key, this.config.get<string>(envName)]),
    );
    const merged = { ...definedOnly(fromFile), ...definedOnly(fromEnv), ...definedOnly(overrides) };

    const parsed = SettingsSchema.safeParse(merged);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      throw new InvalidOptionError(`invalid settings: ${issues}`);
    }
    this.logger.debug(`settings: ${JSON.stringify(parsed.data)}`);
    return parsed.data;
  }

  private async readConfigFile(): Promise<Record<string, unknown>> {
    if (!this.configFile) return {};
    let text: string;
    try {
      text = await readFile(this.configFile, 'utf8');
    } catch (err) {
      throw new InvalidOptionError(`cannot read config file '${this.configFile}': ${errorMessage(err)}`);
    }

    let doc: unknown;
    try {
      doc = load(text);
    } catch (err) {
      const reason = err instanceof YAMLException ? err.reason : errorMessage(err);
      throw new InvalidOptionError(`config file '${this.configFile}' is not valid YAML: ${reason}`);
    }
    if (doc === undefined || doc === null) return {};
    if (!isRecord(doc)) {
      throw new InvalidOptionError(`config file '${this.configFile}' must contain a mapping`);
    }
    return doc;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// undefined and blank values fall through to the next source
function definedOnly(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, v]) => v !== undefined && v !== ''));
}
