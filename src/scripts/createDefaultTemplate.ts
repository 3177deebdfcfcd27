import fs from 'fs/promises';
import path from 'path';
import { settings } from '../config/settings';
import { logger } from '../utils/logger';
import { TEMPLATE_FOLDER } from '../services/folderService';

export const BUNDLED_RESUME_TEMPLATE = path.resolve(__dirname, '../../templates/resume');

/**
 * Seed <resumesRoot>/default with the bundled LaTeX resume.
 * An existing default folder is left alone unless overwrite is set.
 * @returns the default folder and whether anything was written
 */
export async function createDefaultTemplate(
  resumesRoot: string = settings.resumesRoot,
  overwrite = false,
  source: string = BUNDLED_RESUME_TEMPLATE
): Promise<{ folder: string; written: boolean }> {
  const folder = path.join(resumesRoot, TEMPLATE_FOLDER);

  const existing = await fs.stat(folder).catch(() => null);
  if (existing && !overwrite) {
    logger.info(`Default template already exists at ${folder}, leaving it as is`);
    return { folder, written: false };
  }

  if (existing) {
    logger.info('Default template already exists, updating content');
  } else {
    logger.info('Creating new default template');
  }

  await fs.mkdir(resumesRoot, { recursive: true });
  await fs.cp(source, folder, { recursive: true, force: true });
  logger.info(`Default template written to ${folder}`);

  return { folder, written: true };
}
