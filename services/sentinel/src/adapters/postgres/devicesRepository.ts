import { z } from 'zod';
import { DeviceStatusSchema, type DeviceRecord } from '../../domain/entities/device';
import { RegistryError } from '../../domain/errors';
import type { DeviceRegistry } from '../../repositories/devicesRepo';

/** The subset of `pg.Pool` the registry uses. */
export type SqlClient = {
  query(sql: string, params?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
};

const COLUMNS = 'mac_address, status, first_seen, last_seen, comment';
const TABLE = 'sentinel.mac_addresses';

const DeviceRowSchema = z.object({
  mac_address: z.string(),
  status: DeviceStatusSchema,
  first_seen: z.coerce.date(),
  last_seen: z.coerce.date(),
  comment: z.string().nullable()
});

const toDevice = (row: unknown): DeviceRecord => {
  const parsed = DeviceRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new RegistryError('registry row failed validation', { issues: parsed.error.issues.map((issue) => issue.path.join('.')) });
  }
  return {
    mac: parsed.data.mac_address,
    status: parsed.data.status,
    firstSeen: parsed.data.first_seen,
    lastSeen: parsed.data.last_seen,
    comment: parsed.data.comment ?? ''
  };
};

export const createPostgresDeviceRegistry = (sql: SqlClient): DeviceRegistry => {
  const run = async (operation: string, text: string, params: unknown[]) => {
    try {
      return await sql.query(text, params);
    } catch (error) {
      throw new RegistryError(`registry ${operation} failed`, { operation }, error);
    }
  };

  const one = (rows: unknown[]) => (rows[0] === undefined ? null : toDevice(rows[0]));

  return {
    async getStatus(mac) {
      const { rows } = await run('getStatus', `SELECT ${COLUMNS} FROM ${TABLE} WHERE mac_address = $1`, [mac]);
      return one(rows)?.status ?? null;
    },

    async get(mac) {
      const { rows } = await run('get', `SELECT ${COLUMNS} FROM ${TABLE} WHERE mac_address = $1`, [mac]);
      return one(rows);
    },

    async upsert(mac, status, comment) {
      const { rows } = await run(
        'upsert',
        `INSERT INTO ${TABLE} (mac_address, status, first_seen, last_seen, comment)
         VALUES ($1, $2, now(), now(), COALESCE($3, ''))
         ON CONFLICT (mac_address) DO UPDATE
           SET status = EXCLUDED.status,
               last_seen = now(),
               comment = COALESCE($3, ${TABLE}.comment)
         RETURNING ${COLUMNS}`,
        [mac, status, comment ?? null]
      );
      const record = one(rows);
      if (!record) {
        throw new RegistryError('upsert returned no row', { mac });
      }
      return record;
    },

    async touch(mac) {
      const { rows } = await run(
        'touch',
        `UPDATE ${TABLE} SET last_seen = now() WHERE mac_address = $1 RETURNING ${COLUMNS}`,
        [mac]
      );
      return one(rows);
    },

    async update(mac, patch) {
      const { rows } = await run(
        'update',
        `UPDATE ${TABLE}
           SET status = COALESCE($2, status),
               comment = COALESCE($3, comment)
         WHERE mac_address = $1
         RETURNING ${COLUMNS}`,
        [mac, patch.status ?? null, patch.comment ?? null]
      );
      return one(rows);
    },

    async remove(mac) {
      const { rowCount } = await run('remove', `DELETE FROM ${TABLE} WHERE mac_address = $1`, [mac]);
      return (rowCount ?? 0) > 0;
    },

    async listAll() {
      const { rows } = await run('listAll', `SELECT ${COLUMNS} FROM ${TABLE} ORDER BY mac_address`, []);
      return rows.map(toDevice);
    },

    async listByStatus(status) {
      const { rows } = await run(
        'listByStatus',
        `SELECT ${COLUMNS} FROM ${TABLE} WHERE status = $1 ORDER BY mac_address`,
        [status]
      );
      return rows.map(toDevice);
    }
  };
};
