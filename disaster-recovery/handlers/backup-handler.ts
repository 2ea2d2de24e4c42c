// Backup request handler

import type { Logger } from 'winston';
import { describeError } from '../errors';
import { BackupRequestSchema, type BackupResponse } from '../models/contracts';
import type { BackupManager } from '../backup/backup-manager';
import { parseRequest } from './request-parsing';

export interface BackupHandlerDependencies {
  manager: BackupManager;
  logger: Logger;
  now?: () => Date;
}

export type BackupHandler = (event: unknown, signal?: AbortSignal) => Promise<BackupResponse>;

export function createBackupHandler(deps: BackupHandlerDependencies): BackupHandler {
  const now = deps.now ?? (() => new Date());

  const failed = (message: string): BackupResponse => ({
    status: 'failed',
    backup_id: '',
    timestamp: now().toISOString(),
    items_backed_up: 0,
    message,
  });

  return async (event, signal) => {
    const request = parseRequest(BackupRequestSchema, event);
    if (!request.ok) {
      deps.logger.warn('Rejected backup request', { component: 'BackupHandler', error: request.error.message });
      return failed(request.error.message);
    }

    const { table_name, backup_type } = request.value;

    try {
      const result = await deps.manager.runBackup(table_name, backup_type, signal);
      return {
        status: 'success',
        backup_id: result.backupId,
        timestamp: result.completedAt.toISOString(),
        items_backed_up: result.itemsBackedUp,
      };
    } catch (error) {
      deps.logger.error(`Backup of ${table_name} failed`, {
        component: 'BackupHandler',
        error: describeError(error),
      });
      return failed(`Backup of ${table_name} failed`);
    }
  };
}
