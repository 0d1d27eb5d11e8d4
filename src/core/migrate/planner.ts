/**
 * Migration planner - finds the configuration and state files of a project.
 */
import { fileExists, globFiles, isDirectory, relativePath, resolvePath } from '../../utils/file-system.js';
import { ErrorCodes, SystemError } from '../../utils/errors.js';
import type { MigratePlanOptions, MigrationPlan, PlannedFile } from './types.js';

export const DEFAULT_STATE_FILE = 'terraform.tfstate';

const DEFAULT_IGNORE = ['**/node_modules/**', '**/.terraform/**'];

/**
 * Create a migration plan for a project directory.
 */
export async function createMigrationPlan(
  projectRoot: string,
  options: MigratePlanOptions
): Promise<MigrationPlan> {
  const root = resolvePath(projectRoot);
  if (!(await isDirectory(root))) {
    throw new SystemError(ErrorCodes.FILE_NOT_FOUND, `Project directory not found: ${root}`, { path: root });
  }
  const configFiles = await globFiles(options.include, {
    cwd: root,
    ignore: [...DEFAULT_IGNORE, ...options.exclude],
  });

  const files: PlannedFile[] = configFiles.map((filePath) => ({
    filePath,
    relativePath: relativePath(root, filePath),
    target: 'config',
  }));

  const statePath = await findStateFile(root, options.stateFile);
  if (statePath) {
    files.push({ filePath: statePath, relativePath: relativePath(root, statePath), target: 'state' });
  }

  return {
    projectRoot: root,
    sourceVersion: options.sourceVersion,
    targetVersion: options.targetVersion,
    files,
  };
}

/**
 * An explicit state file must exist; the default one is optional.
 */
async function findStateFile(root: string, stateFile?: string): Promise<string | undefined> {
  if (stateFile) {
    const explicit = resolvePath(root, stateFile);
    if (!(await fileExists(explicit))) {
      throw new SystemError(ErrorCodes.FILE_NOT_FOUND, `State file not found: ${explicit}`, {
        filePath: explicit,
      });
    }
    return explicit;
  }
  const fallback = resolvePath(root, DEFAULT_STATE_FILE);
  return (await fileExists(fallback)) ? fallback : undefined;
}
