import * as path from "path";
import { createContainer } from "../../../../../src/adapters/primary/di/dependencyContainer";
import { TriState } from "../../../../../src/domain/model/TriState";
import { InMemoryFileSystem } from "../../../../helpers/InMemoryFileSystem";
import { createMockLogger } from "../../../../helpers/mockLogger";

describe("createContainer", () => {
  const ROOT = path.resolve("/project");
  const PROJECTS = path.resolve("/config/projects.json");
  const A = path.join(ROOT, "a.txt");

  test("should wire the engine and project manager to the given adapters", () => {
    const fsAdapter = new InMemoryFileSystem({ [A]: "hello" });
    const logger = createMockLogger();

    const container = createContainer(
      { rootPath: ROOT, projectsFilePath: PROJECTS },
      { fsAdapter, logger }
    );

    expect(container.options.rootPath).toBe(ROOT);
    expect(container.logger).toBe(logger);
    expect(container.projectManager.list()).toEqual([]);

    container.engine.toggle(A);
    expect(container.engine.getState(ROOT)).toBe(TriState.FullySelected);

    container.projectManager.save("demo", container.engine);
    expect(container.projectRepository.loadAll()).toEqual([
      { name: "demo", rootPath: ROOT, selectedPaths: [A] },
    ]);
  });

  test("should load previously saved projects on creation", () => {
    const fsAdapter = new InMemoryFileSystem({
      [PROJECTS]: JSON.stringify({
        projects: [{ name: "saved", root_path: ROOT, selected_paths: [A] }],
      }),
    });

    const container = createContainer(
      { rootPath: ROOT, projectsFilePath: PROJECTS },
      { fsAdapter, logger: createMockLogger() }
    );

    expect(container.projectManager.find("saved")).toEqual({
      name: "saved",
      rootPath: ROOT,
      selectedPaths: [A],
    });
  });
});
