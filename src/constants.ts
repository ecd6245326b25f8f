export const CLI_NAME = "album-sentinel";

// Synology-style metadata folders and Windows thumbnail caches.
export const DEFAULT_EXCLUDED_DIRS = ["#snapshot", "@eaDir"];
export const DEFAULT_EXCLUDED_FILES = ["Thumbs.db"];

export const ALBUM_DELIMITER = " - ";

export const UNASSIGNED_GROUP_ID = 1;
export const UNASSIGNED_GROUP_NAME = "Unassigned";

export const DEFAULT_REPORT_FILE = `${CLI_NAME}-report.html`;
