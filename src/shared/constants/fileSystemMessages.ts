export const FILE_SYSTEM_MESSAGES = {
  ERRORS: {
    DIRECTORY_UNREADABLE: (path: string, error: string) =>
      `Unreadable directory ${path}: ${error}`,
    FILE_UNOPENABLE: (path: string, error: string) =>
      `Could not open ${path}: ${error}`,
    NOT_A_FILE: (path: string) => `Not a regular file: ${path}`,
    PROJECTS_UNREADABLE: (path: string, error: string) =>
      `Could not read projects from ${path}: ${error}`,
    PROJECTS_WRITE: (path: string, error: string) =>
      `Could not write projects to ${path}: ${error}`,
  },
  SUCCESS: {
    FILES_AGGREGATED: (files: number, tokens: number) =>
      `✅ Aggregated ${files} files (~${tokens} tokens)`,
  },
} as const;
