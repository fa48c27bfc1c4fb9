// SPDX-License-Identifier: LicenseRef-ANW-1.0
export * from "./types.js";
export {
  ValidationError,
  MAX_CATEGORY_NAME_LENGTH,
  MAX_CONTENT_LENGTH,
  MAX_DESCRIPTION_LENGTH,
  MAX_LIST_LIMIT,
  MAX_QUERY_LENGTH,
  MAX_TITLE_LENGTH,
} from "./validation.js";
export { listCategories, addCategory, renameCategory, deleteCategory } from "./categories.js";
export {
  CategoryNotFoundError,
  DEFAULT_SEARCH_LIMIT,
  createArticle,
  editArticle,
  deleteArticle,
  viewArticle,
  searchArticles,
  listArticlesInCategory,
} from "./articles.js";
export {
  BACKUPS_PER_ACTOR,
  DEFAULT_BACKUP_LIST_LIMIT,
  captureBackup,
  listRecentBackups,
  getBackup,
  checkConflict,
} from "./backups.js";
export { restoreBackup, type RestoreBackupOptions, type RestoreOptions } from "./restore.js";
export {
  DEFAULT_SNAPSHOT_LIST_LIMIT,
  listSnapshots,
  getSnapshot,
  restoreSnapshot,
} from "./snapshots.js";
export {
  SNAPSHOT_RETENTION_SECONDS,
  runMaintenanceCycle,
  getMaintenanceStatus,
} from "./maintenance.js";
