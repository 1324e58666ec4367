import { DbClient, query } from "../db.js";

export async function getNoticeOption(client: DbClient, key: string): Promise<boolean> {
  const { rows } = await query<{ value: boolean }>(
    client,
    `SELECT value FROM notice_option WHERE option_key = $1 LIMIT 1`,
    [key]
  );
  return Boolean(rows[0]?.value);
}

export async function setNoticeOption(
  client: DbClient,
  key: string,
  value: boolean
): Promise<void> {
  await query(
    client,
    `
      INSERT INTO notice_option (option_key, value, updated_at)
      VALUES ($1, $2, now())
      ON CONFLICT (option_key) DO UPDATE
        SET value = EXCLUDED.value, updated_at = EXCLUDED.updated_at
    `,
    [key, value]
  );
}

export async function getUserNoticeFlag(
  client: DbClient,
  userId: string,
  key: string
): Promise<boolean> {
  const { rows } = await query<{ value: boolean }>(
    client,
    `SELECT value FROM notice_user_flag WHERE user_id = $1 AND option_key = $2 LIMIT 1`,
    [userId, key]
  );
  return Boolean(rows[0]?.value);
}

export async function setUserNoticeFlag(
  client: DbClient,
  userId: string,
  key: string,
  value: boolean
): Promise<void> {
  await query(
    client,
    `
      INSERT INTO notice_user_flag (user_id, option_key, value, updated_at)
      VALUES ($1, $2, $3, now())
      ON CONFLICT (user_id, option_key) DO UPDATE
        SET value = EXCLUDED.value, updated_at = EXCLUDED.updated_at
    `,
    [userId, key, value]
  );
}
