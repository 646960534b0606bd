export { defineTool, describeParameters, toArgumentIssues, type ToolDefinition } from './define.js';
export { toFunctionDefinition, toJsonSchema, type FunctionDefinition, type JsonSchemaProperty, type ToolJsonSchema } from './schema.js';
export {
  createToolDispatcher,
  type DispatcherDeps,
  type DispatchOptions,
  type ToolDispatcher,
  type ToolStatistics,
} from './dispatch.js';
export { createFileSystemTools, createWebTools } from './registry.js';
export { lockKeys, type FileToolDeps } from './file-deps.js';
export type { WebToolDeps } from './web-deps.js';
export { createReadFileTool } from './read-file.js';
export { createWriteFileTool } from './write-file.js';
export { createListDirectoryTool } from './list-directory.js';
export { createCopyPathTool } from './copy-path.js';
export { createMovePathTool } from './move-path.js';
export { createDeletePathTool } from './delete-path.js';
export { createSearchFilesTool } from './search-files.js';
export { createHashFileTool } from './hash-file.js';
export { createBackupPathTool } from './backup-path.js';
export { createRestoreBackupTool } from './restore-backup.js';
export { createFileInfoTool } from './file-info.js';
export { createMakeDirectoryTool } from './make-directory.js';
export { createWebSearchTool } from './web-search.js';
export { createExtractContentTool } from './extract-content.js';
export { createValidateUrlTool } from './validate-url.js';
export { createParseRssTool } from './parse-rss.js';
export { createSearchNewsTool } from './search-news.js';
export { createGetPageInfoTool } from './get-page-info.js';
export { createBulkFetchTool } from './bulk-fetch.js';
