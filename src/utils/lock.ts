import fs from 'fs';
import path from 'path';
import { CONFIG } from '../config/constants';
import { RunInProgressError } from './error-handler';
import { logger } from './logger';

export interface LockInfo {
  pid: number;
  startedAt: string;
  command: string;
}

export interface LockOptions {
  lockFile?: string;
  staleAfterMs?: number;
  overrideStale?: boolean;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0); // Signal 0 checks if process exists
    return true;
  } catch (e) {
    return false;
  }
}

function readLock(lockFile: string): LockInfo | null {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(lockFile, 'utf-8'));
    if (
      typeof parsed === 'object' && parsed !== null &&
      'pid' in parsed && typeof parsed.pid === 'number' &&
      'startedAt' in parsed && typeof parsed.startedAt === 'string'
    ) {
      const command = 'command' in parsed && typeof parsed.command === 'string' ? parsed.command : '';
      return { pid: parsed.pid, startedAt: parsed.startedAt, command };
    }
    return null;
  } catch (e) {
    return null;
  }
}

export function acquireLock(options: LockOptions = {}): LockInfo | null {
  const lockFile = options.lockFile ?? CONFIG.STORAGE.LOCK_FILE;
  const staleAfter = options.staleAfterMs ?? CONFIG.STORAGE.LOCK_STALE_AFTER;
  fs.mkdirSync(path.dirname(lockFile), { recursive: true });

  if (fs.existsSync(lockFile)) {
    const existing = readLock(lockFile);

    if (!existing) {
      logger.warn(`Removing unreadable lock file ${lockFile}`);
      fs.unlinkSync(lockFile);
    } else if (!isProcessAlive(existing.pid)) {
      logger.warn(`Removing lock left by exited process ${existing.pid}`);
      fs.unlinkSync(lockFile);
    } else {
      const age = Date.now() - new Date(existing.startedAt).getTime();
      if (age <= staleAfter || !options.overrideStale) {
        return null;
      }
      logger.warn(`Overriding stale lock held by ${existing.pid} since ${existing.startedAt}`);
      fs.unlinkSync(lockFile);
    }
  }

  const lockInfo: LockInfo = {
    pid: process.pid,
    startedAt: new Date().toISOString(),
    command: process.argv.join(' ')
  };

  try {
    // 'wx' fails if another process created the file in the meantime
    fs.writeFileSync(lockFile, JSON.stringify(lockInfo, null, 2), { flag: 'wx' });
  } catch (e) {
    return null;
  }
  return lockInfo;
}

export function readLockHolder(lockFile: string = CONFIG.STORAGE.LOCK_FILE): LockInfo | null {
  return fs.existsSync(lockFile) ? readLock(lockFile) : null;
}

export function releaseLock(lockFile: string = CONFIG.STORAGE.LOCK_FILE): void {
  const lockInfo = readLockHolder(lockFile);
  // Only release if we own the lock
  if (lockInfo && lockInfo.pid === process.pid) {
    fs.unlinkSync(lockFile);
  }
}

export async function withLock<T>(fn: () => Promise<T>, options: LockOptions = {}): Promise<T> {
  const lockFile = options.lockFile ?? CONFIG.STORAGE.LOCK_FILE;
  const lock = acquireLock(options);
  if (!lock) {
    throw new RunInProgressError(readLockHolder(lockFile)?.pid ?? null);
  }

  try {
    return await fn();
  } finally {
    releaseLock(lockFile);
  }
}
