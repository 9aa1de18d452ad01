import { promises as fs } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { TransactionLog } from './atomic.js';
import { PkgCreateError, SkeletonMissingError } from './errors.js';
import { logger } from './logger.js';
import { countPlaceholders, renderTemplate, validateTemplateVariables } from './template.js';
import { ErrorCode } from './types.js';
import { exists } from './utils.js';

export const README_FILE = 'README.md';

export const README_SECTIONS = [
  'Description',
  'Topics Published to',
  'Topics Subscribed to',
  'Parameters',
  'Acknowledgements'
] as const;

export function getSkelDir(): string {
  return join(dirname(fileURLToPath(import.meta.url)), '..', 'skel');
}

/**
 * Reads the README template and checks that its title line carries the
 * only package name placeholder. Runs before anything is created.
 */
export async function loadReadmeTemplate(skelDir: string = getSkelDir()): Promise<string> {
  const templatePath = join(skelDir, README_FILE);

  if (!await exists(templatePath)) {
    throw new SkeletonMissingError(templatePath);
  }

  const template = await fs.readFile(templatePath, 'utf-8');
  const [title = ''] = template.split('\n');

  if (countPlaceholders(template, 'PACKAGE_NAME') !== 1 || !title.startsWith('# {{PACKAGE_NAME}}')) {
    throw new PkgCreateError(
      `PACKAGE CORRUPTED: README template must start with '# {{PACKAGE_NAME}}'\n` +
      `Template: ${templatePath}`,
      ErrorCode.SKELETON_FILES_MISSING
    );
  }

  logger.debug('README template loaded', { path: templatePath });
  return template;
}

export function renderReadme(packageName: string, template: string): string {
  const variables = validateTemplateVariables({ PACKAGE_NAME: packageName });
  return renderTemplate(template, variables);
}

export async function writeReadme(
  tx: TransactionLog,
  packageName: string,
  template: string
): Promise<void> {
  await tx.write(join(tx.root, README_FILE), renderReadme(packageName, template));
}
