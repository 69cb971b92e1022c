import { GaxiosError, GaxiosResponse } from 'gaxios';
import { sheets_v4 } from 'googleapis';
import { DateTime } from 'luxon';
import { loadConfig } from '../src/config/config';
import { BOOK_PERMISSIONS, SYSTEM_ACTOR_ID } from '../src/domain/types';
import {
  createSheetsClient,
  GoogleSheetsRepository,
  HEADERS,
  toSheetValuesApi
} from '../src/repositories/googleSheetsRepository';
import logger from '../src/utils/logger';
import { hashSecret } from '../src/utils/passwordHasher';
import { withRetry } from '../src/utils/retry';

type SheetsClient = sheets_v4.Sheets;

const SYSTEM_USER_NAME = 'System Administrator';

const isMissingSheetError = (error: unknown): error is GaxiosError => {
  if (!error || typeof error !== 'object') {
    return false;
  }

  const gaxiosError = error as GaxiosError;
  const status = gaxiosError?.response?.status;
  if (status !== 400) {
    return false;
  }

  const message =
    (gaxiosError.response?.data as { error?: { message?: string } })?.error?.message ||
    gaxiosError.message;

  return typeof message === 'string' && message.includes('Unable to parse range');
};

async function ensureSheet(sheets: SheetsClient, spreadsheetId: string, tab: string, header: string[]): Promise<void> {
  const range = `${tab}!A1:${String.fromCharCode(65 + header.length - 1)}1`;

  let response: GaxiosResponse<sheets_v4.Schema$ValueRange> | undefined;

  try {
    response = await withRetry(() => sheets.spreadsheets.values.get({ spreadsheetId, range }));
  } catch (error) {
    if (!isMissingSheetError(error)) {
      throw error;
    }

    await withRetry(() =>
      sheets.spreadsheets.batchUpdate({
        spreadsheetId,
        requestBody: {
          requests: [{ addSheet: { properties: { title: tab } } }]
        }
      })
    );
    logger.info({ tab }, 'Sheet created');
  }

  const current = response?.data?.values?.[0];
  if (current && header.every((value, index) => current[index] === value)) {
    return;
  }

  await withRetry(() =>
    sheets.spreadsheets.values.update({
      spreadsheetId,
      range,
      valueInputOption: 'RAW',
      requestBody: { values: [header] }
    })
  );
  logger.info({ tab }, current ? 'Header replaced to match expected schema' : 'Header created');
}

async function seedPermissions(repository: GoogleSheetsRepository): Promise<void> {
  const existing = new Set(await repository.listPermissionNames());
  for (const name of Object.values(BOOK_PERMISSIONS)) {
    if (existing.has(name)) {
      continue;
    }
    await repository.createPermission(name);
    logger.info({ permission: name }, 'Permission created');
  }
}

async function seedSystemUser(repository: GoogleSheetsRepository, bcryptCost: number): Promise<void> {
  if (await repository.getUserById(SYSTEM_ACTOR_ID)) {
    logger.info('System user already present');
    return;
  }

  const password = process.env.SYSTEM_USER_PASSWORD;
  if (!password) {
    throw new Error('Missing required environment variable: SYSTEM_USER_PASSWORD');
  }
  const now = DateTime.utc().toISO() ?? new Date().toISOString();

  await repository.createUser({
    id: SYSTEM_ACTOR_ID,
    name: SYSTEM_USER_NAME,
    email: process.env.SYSTEM_USER_EMAIL || 'system@example.com',
    passwordHash: await hashSecret(password, bcryptCost),
    createdAt: now,
    updatedAt: now
  });
  logger.info({ id: SYSTEM_ACTOR_ID }, 'System user created');
}

async function main(): Promise<void> {
  const config = loadConfig();
  const sheets: SheetsClient = createSheetsClient(config.storage.googleServiceAccountJson);
  const spreadsheetId = config.storage.spreadsheetId;

  for (const [tab, header] of Object.entries(HEADERS)) {
    await ensureSheet(sheets, spreadsheetId, tab, header);
  }

  const repository = new GoogleSheetsRepository(toSheetValuesApi(sheets.spreadsheets.values), {
    spreadsheetId,
    cacheTtlSeconds: config.storage.cacheTtlSeconds,
    timeoutMs: config.storage.timeoutMs
  });

  await seedPermissions(repository);
  await seedSystemUser(repository, config.password.bcryptCost);

  logger.info('Google Sheets seed completed');
}

main().catch((error) => {
  logger.error({ error }, 'Failed to seed Google Sheets');
  process.exit(1);
});
