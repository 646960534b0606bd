import type { RegisteredTool } from '../types/index.js';
import type { FileToolDeps } from './file-deps.js';
import type { WebToolDeps } from './web-deps.js';
import { createReadFileTool } from './read-file.js';
import { createWriteFileTool } from './write-file.js';
import { createListDirectoryTool } from './list-directory.js';
import { createCopyPathTool } from './copy-path.js';
import { createMovePathTool } from './move-path.js';
import { createDeletePathTool } from './delete-path.js';
import { createSearchFilesTool } from './search-files.js';
import { createHashFileTool } from './hash-file.js';
import { createBackupPathTool } from './backup-path.js';
import { createRestoreBackupTool } from './restore-backup.js';
import { createFileInfoTool } from './file-info.js';
import { createMakeDirectoryTool } from './make-directory.js';
import { createWebSearchTool } from './web-search.js';
import { createExtractContentTool } from './extract-content.js';
import { createValidateUrlTool } from './validate-url.js';
import { createParseRssTool } from './parse-rss.js';
import { createSearchNewsTool } from './search-news.js';
import { createGetPageInfoTool } from './get-page-info.js';
import { createBulkFetchTool } from './bulk-fetch.js';

export function createFileSystemTools(deps: FileToolDeps): ReadonlyArray<RegisteredTool> {
  return [
    createReadFileTool(deps),
    createWriteFileTool(deps),
    createListDirectoryTool(deps),
    createCopyPathTool(deps),
    createMovePathTool(deps),
    createDeletePathTool(deps),
    createSearchFilesTool(deps),
    createHashFileTool(deps),
    createBackupPathTool(deps),
    createRestoreBackupTool(deps),
    createFileInfoTool(deps),
    createMakeDirectoryTool(deps),
  ];
}

export function createWebTools(deps: WebToolDeps): ReadonlyArray<RegisteredTool> {
  return [
    createWebSearchTool(deps),
    createExtractContentTool(deps),
    createValidateUrlTool(deps),
    createParseRssTool(deps),
    createSearchNewsTool(deps),
    createGetPageInfoTool(deps),
    createBulkFetchTool(deps),
  ];
}
