import os from 'node:os';
import path from 'node:path';
import { render } from 'ink';
import { App } from '../src/App';
import { readConfig } from '../src/editor/config';
import { createLogger } from '../src/editor/logger';
import { applyProject } from '../src/editor/project';
import { EditorSession } from '../src/editor/session';
import type { FileApi } from '../src/fileApi';
import {
  deletePaletteFile,
  findAutosave,
  listPaletteFiles,
  listProjectFiles,
  loadCustomPalette,
  openProjectFile,
  saveCustomPalette,
  saveProjectFile,
  writeAutosave,
  writeExport
} from './files';
import { forgetRecentFile, loadPreferences, rememberRecentFile } from './preferences';

async function main(): Promise<void> {
  const config = readConfig(process.env, process.argv.slice(2), path.join(os.homedir(), '.termpix'));
  const logger = createLogger(config.logLevel);
  const workingDirectory = process.cwd();
  let preferences = await loadPreferences(config.homeDir, logger);

  const rememberFile = async (filePath: string): Promise<void> => {
    preferences = await rememberRecentFile(config.homeDir, preferences, filePath, logger);
  };

  const files: FileApi = {
    openProject: (filePath) => openProjectFile(filePath, logger),
    saveProject: (filePath, project) => saveProjectFile(filePath, project, logger),
    writeAutosave: (filePath, project) => writeAutosave(filePath, project, logger),
    writeExport: (filePath, text) => writeExport(filePath, text, logger),
    rememberFile,
    listProjects: (dir) => listProjectFiles(dir),
    listPalettes: (dir) => listPaletteFiles(dir),
    loadPalette: (filePath) => loadCustomPalette(filePath),
    savePalette: (filePath, palette) => saveCustomPalette(filePath, palette, logger),
    deletePalette: (filePath) => deletePaletteFile(filePath, logger)
  };

  const session = new EditorSession({ logger });
  let initialFilePath: string | null = null;
  let initialCreatedAt: string | undefined;
  let recoveryPath: string | null = null;

  if (config.initialFile) {
    const filePath = path.resolve(workingDirectory, config.initialFile);
    const result = await openProjectFile(filePath, logger);
    if (result.ok) {
      applyProject(session, result.project);
      initialFilePath = result.filePath;
      initialCreatedAt = result.project.createdAt || undefined;
      await rememberFile(result.filePath);
    } else if (result.error === 'not-found') {
      // A new project is created at this path on first save.
      initialFilePath = filePath;
      preferences = await forgetRecentFile(config.homeDir, preferences, filePath, logger);
    } else {
      logger.error(result.message);
      process.exitCode = 1;
      return;
    }
  } else {
    recoveryPath = await findAutosave(workingDirectory);
  }

  logger.debug(`starting in ${workingDirectory}`);
  const { waitUntilExit } = render(
    <App
      session={session}
      files={files}
      workingDirectory={workingDirectory}
      initialFilePath={initialFilePath}
      initialCreatedAt={initialCreatedAt}
      recoveryPath={recoveryPath}
    />
  );
  await waitUntilExit();
}

main().catch((error: unknown) => {
  createLogger().error('unexpected error', error);
  process.exitCode = 1;
});
