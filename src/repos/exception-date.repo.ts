import { query } from '../db/client.js';
import type { ExceptionDateRepository } from '../domain/interfaces.js';
import type { CalendarDate, DateWindow, ExceptionDate } from '../domain/types.js';

// DATE columns are rendered as text so pg does not turn them into
// local-midnight Date objects.
const SELECT_EXCEPTION = `SELECT to_char(date, 'YYYY-MM-DD') AS date, reason,
  is_active AS active, created_at
  FROM exception_dates`;

const RETURNING = `RETURNING to_char(date, 'YYYY-MM-DD') AS date, reason,
  is_active AS active, created_at`;

export const exceptionDateRepo: ExceptionDateRepository = {
  async findByDate(date: CalendarDate): Promise<ExceptionDate | null> {
    const { rows } = await query<ExceptionDate>(`${SELECT_EXCEPTION} WHERE date = $1::date`, [date]);
    return rows[0] ?? null;
  },

  async list(window?: DateWindow): Promise<ExceptionDate[]> {
    const { rows } = window
      ? await query<ExceptionDate>(
          `${SELECT_EXCEPTION} WHERE date BETWEEN $1::date AND $2::date ORDER BY date`,
          [window.startDate, window.endDate],
        )
      : await query<ExceptionDate>(`${SELECT_EXCEPTION} ORDER BY date`);
    return rows;
  },

  async create(data: { date: CalendarDate; reason: string; active: boolean }): Promise<ExceptionDate | null> {
    const { rows } = await query<ExceptionDate>(
      `INSERT INTO exception_dates (date, reason, is_active)
       VALUES ($1::date, $2, $3)
       ON CONFLICT (date) DO NOTHING
       ${RETURNING}`,
      [data.date, data.reason, data.active],
    );
    return rows[0] ?? null;
  },

  async update(date: CalendarDate, data: { reason?: string; active?: boolean }): Promise<ExceptionDate | null> {
    const { rows } = await query<ExceptionDate>(
      `UPDATE exception_dates
       SET reason = COALESCE($2, reason),
           is_active = COALESCE($3, is_active)
       WHERE date = $1::date
       ${RETURNING}`,
      [date, data.reason ?? null, data.active ?? null],
    );
    return rows[0] ?? null;
  },

  async delete(date: CalendarDate): Promise<boolean> {
    const { rowCount } = await query('DELETE FROM exception_dates WHERE date = $1::date', [date]);
    return (rowCount ?? 0) > 0;
  },
};
