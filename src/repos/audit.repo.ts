import { query } from '../db/client.js';
import type { AuditSink } from '../domain/interfaces.js';
import type { AuditEntry } from '../domain/types.js';

export const auditRepo: AuditSink = {
  async log(entry: AuditEntry): Promise<void> {
    await query(
      `INSERT INTO audit_log (event_type, entity_type, entity_id, actor, payload)
       VALUES ($1, $2, $3, $4, $5)`,
      [
        entry.event_type,
        entry.entity_type,
        entry.entity_id,
        entry.actor,
        entry.payload ? JSON.stringify(entry.payload) : null,
      ],
    );
  },
};
