import * as path from "path";
import {
  DEFAULT_PROJECTS_FILE,
  loadConfiguration,
} from "../../../../../src/adapters/primary/di/configuration";

describe("loadConfiguration", () => {
  const CWD = path.resolve("/work");

  test("should fall back to defaults for an empty environment", () => {
    expect(loadConfiguration({}, CWD)).toEqual({
      rootPath: CWD,
      projectsFilePath: path.join(CWD, DEFAULT_PROJECTS_FILE),
      customIgnorePatterns: [],
      includeDefaultPatterns: false,
      includeGitIgnore: false,
      verboseLogging: false,
    });
  });

  test("should read every supported variable", () => {
    const options = loadConfiguration(
      {
        TREE_CONTEXT_ROOT: "repo",
        TREE_CONTEXT_PROJECTS_FILE: "/data/saved.json",
        TREE_CONTEXT_IGNORE: "*.log, dist/ ,,",
        TREE_CONTEXT_DEFAULT_PATTERNS: "true",
        TREE_CONTEXT_GITIGNORE: "YES",
        TREE_CONTEXT_VERBOSE: "1",
      },
      CWD
    );

    expect(options).toEqual({
      rootPath: path.join(CWD, "repo"),
      projectsFilePath: path.resolve("/data/saved.json"),
      customIgnorePatterns: ["*.log", "dist/"],
      includeDefaultPatterns: true,
      includeGitIgnore: true,
      verboseLogging: true,
    });
  });

  test("should treat unknown flag values as false", () => {
    const options = loadConfiguration({ TREE_CONTEXT_VERBOSE: "maybe" }, CWD);
    expect(options.verboseLogging).toBe(false);
  });
});
