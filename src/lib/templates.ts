import { readFile } from 'fs/promises';
import { NotFoundError } from '../errors.js';
import { isFile } from './paths.js';

export interface PageTemplates {
  header: string;
  footer: string;
}

export const EMPTY_TEMPLATES: PageTemplates = { header: '', footer: '' };

const loadTemplate = async (path: string | undefined): Promise<string> => {
  if (!path) {
    return '';
  }
  if (!(await isFile(path))) {
    throw new NotFoundError('template', path);
  }
  return readFile(path, 'utf-8');
};

/** Read the header and footer wrapped around every generated HTML page */
export const loadTemplates = async (paths: { header?: string; footer?: string }): Promise<PageTemplates> => {
  return {
    header: await loadTemplate(paths.header),
    footer: await loadTemplate(paths.footer),
  };
};
