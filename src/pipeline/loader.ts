import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';

// src/pipeline and dist/pipeline are both two levels below the package root
const LOADER_TEMPLATE_PATH = fileURLToPath(new URL('../../templates/loader.js', import.meta.url));

export interface LoaderOptions {
  appName: string;
  /** Stylesheet file name beside the module, if one was built */
  stylesheet?: string;
}

let cachedTemplate: string | undefined;

export async function readLoaderTemplate(): Promise<string> {
  cachedTemplate ??= await readFile(LOADER_TEMPLATE_PATH, 'utf-8');
  return cachedTemplate;
}

export function renderLoader(template: string, options: LoaderOptions): string {
  return template
    .replace(/\{\{APP_NAME\}\}/g, () => options.appName)
    .replace(/\{\{STYLESHEET\}\}/g, () => (options.stylesheet ? JSON.stringify(options.stylesheet) : 'null'));
}
