// ============================================================
// Configuration Service — the single scheduling configuration
//
// Lazily initialised from defaults on first read. Updates are
// all-or-nothing: one bad field rejects the whole patch.
// ============================================================

import { z } from 'zod';
import { ConfigurationError } from '../domain/errors.js';
import type { AuditSink, ConfigurationRepository } from '../domain/interfaces.js';
import type { Configuration, ConfigurationFields } from '../domain/types.js';
import { isValidTimeZone } from '../utils/wall-clock.js';

export const DEFAULT_CONFIGURATION: ConfigurationFields = {
  slot_duration_minutes: 60,
  max_appointments_per_slot: 1,
  timezone: 'UTC',
  min_booking_lead_minutes: 1440,
};

const ConfigurationFieldsSchema = z.object({
  slot_duration_minutes: z.number().int().positive(),
  max_appointments_per_slot: z.number().int().min(1),
  timezone: z.string().refine(isValidTimeZone, { message: 'Unknown IANA timezone' }),
  min_booking_lead_minutes: z.number().int().min(0),
}).strict();

const ConfigurationPatchSchema = ConfigurationFieldsSchema.partial();

export type ConfigurationPatch = z.infer<typeof ConfigurationPatchSchema>;

function toConfigurationError(message: string, error: z.ZodError): ConfigurationError {
  return new ConfigurationError(message, {
    fields: error.issues.map((issue) => ({
      field: issue.path.join('.') || null,
      message: issue.message,
    })),
  });
}

export class ConfigurationService {
  private readonly defaults: ConfigurationFields;

  /**
   * @throws ConfigurationError when `defaults` would not pass an update.
   */
  constructor(
    private readonly repo: ConfigurationRepository,
    private readonly audit: AuditSink,
    defaults: ConfigurationFields = DEFAULT_CONFIGURATION,
  ) {
    const parsed = ConfigurationFieldsSchema.safeParse(defaults);
    if (!parsed.success) {
      throw toConfigurationError('Invalid configuration defaults.', parsed.error);
    }
    this.defaults = parsed.data;
  }

  async get(): Promise<Configuration> {
    return this.repo.getOrCreate(this.defaults);
  }

  /**
   * Validate and apply a partial update. `fields` is untrusted input.
   */
  async update(fields: unknown): Promise<Configuration> {
    const parsed = ConfigurationPatchSchema.safeParse(fields);
    if (!parsed.success) {
      throw toConfigurationError('Invalid configuration update.', parsed.error);
    }

    // Creates the row from defaults if this is the first access.
    await this.get();
    const saved = await this.repo.update(parsed.data);
    await this.audit.log({
      event_type: 'configuration.updated',
      entity_type: 'configuration',
      entity_id: null,
      actor: 'admin',
      payload: { changes: parsed.data },
    });
    console.log(`[configuration] Updated: ${Object.keys(parsed.data).join(', ') || '(no fields)'}`);
    return saved;
  }
}
