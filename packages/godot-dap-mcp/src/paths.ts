import * as path from 'path';
import * as fs from 'fs-extra';
import { ToolProblemError } from './errorUtils';

const RESOURCE_PREFIX = 'res://';
export const PROJECT_FILE = 'project.godot';

/**
 * Turns a script path into the absolute path the debugger expects.
 * `res://` paths are joined onto the project root; absolute paths pass
 * through; anything else is rejected.
 */
export function resolveGodotPath(file: string, projectRoot?: string): string {
  if (file === '') {
    throw new Error('Path cannot be empty');
  }
  if (file.startsWith(RESOURCE_PREFIX)) {
    if (!projectRoot) {
      throw new Error(
        `Cannot resolve ${file}: project root not set. Pass 'project' to godot_connect or use an absolute path.`,
      );
    }
    return path.join(projectRoot, file.slice(RESOURCE_PREFIX.length));
  }
  if (path.isAbsolute(file)) {
    return file;
  }
  throw new Error(`Path must be absolute or start with res:// (got: ${file})`);
}

/** Checks that `projectPath` is an absolute directory holding project.godot. */
export async function validateProjectPath(projectPath: string): Promise<string> {
  const projectFile = path.join(projectPath, PROJECT_FILE);
  if (path.isAbsolute(projectPath) && (await fs.pathExists(projectFile))) {
    return path.normalize(projectPath);
  }
  throw new ToolProblemError('Invalid project path: project.godot not found', {
    context: projectFile,
    suggestions: [
      'Point the path at the directory that contains project.godot',
      'Use an absolute path such as /full/path/to/project',
      `Check that the file exists: ls ${projectFile}`,
    ],
    errorType: 'invalid_project',
  });
}
