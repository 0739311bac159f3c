/**
 * Node File Persistence
 *
 * node:fs/promises 기반 PersistenceIO
 *
 * 각 호출은 readFile/writeFile/rm 헬퍼가 파일 핸들을 열고 닫으므로
 * 예외 경로를 포함해 핸들이 남지 않음
 */

import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import type { PersistenceIO } from './types';

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function createNodePersistence(): PersistenceIO {
  return {
    async readFile(path: string): Promise<string | null> {
      try {
        return await readFile(path, 'utf8');
      } catch (error) {
        if (isNodeError(error) && error.code === 'ENOENT') {
          return null;
        }
        throw error;
      }
    },

    async writeFile(path: string, text: string): Promise<void> {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, text, 'utf8');
    },

    async deleteFile(path: string): Promise<boolean> {
      try {
        await rm(path);
        return true;
      } catch (error) {
        if (isNodeError(error) && error.code === 'ENOENT') {
          return false;
        }
        throw error;
      }
    },

    join(directory: string, fileName: string): string {
      return join(directory, fileName);
    },
  };
}
