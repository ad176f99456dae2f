import { readFile, readdir } from 'fs/promises';
import { join, extname } from 'path';
import { parseTemplateDefinition, toDocumentTemplate } from './parser.js';
import type { DocumentTemplate } from './document-template.js';
import type { Logger } from '../types.js';

/**
 * A template read from disk, with the name it registers under
 */
export interface LoadedTemplate {
  name: string;
  template: DocumentTemplate;
  filePath: string;
}

/**
 * Anything that accepts master templates by name
 */
export interface TemplateSink {
  register(name: string, template: DocumentTemplate): void;
}

/**
 * Template Loader - Loads master templates from YAML files
 */
export class TemplateLoader {
  private logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * Load a single template from file
   *
   * @param filePath - Path to template YAML file
   */
  async loadTemplate(filePath: string): Promise<LoadedTemplate> {
    try {
      const content = await readFile(filePath, 'utf-8');
      const definition = parseTemplateDefinition(content);

      this.logger?.debug(`Loaded template: ${definition.name} from ${filePath}`);

      return { name: definition.name, template: toDocumentTemplate(definition), filePath };
    } catch (error) {
      this.logger?.warn(`Failed to load template from ${filePath}`, {
        error: error instanceof Error ? error.message : 'Unknown',
      });
      throw error;
    }
  }

  /**
   * Load all templates from a directory
   *
   * Invalid files are skipped; a missing directory yields no templates.
   */
  async loadFromDirectory(dirPath: string): Promise<LoadedTemplate[]> {
    let files: string[];

    try {
      files = await readdir(dirPath);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        this.logger?.debug(`Template directory not found: ${dirPath}`);
        return [];
      }
      throw error;
    }

    const yamlFiles = files
      .filter((f) => extname(f) === '.yaml' || extname(f) === '.yml')
      .sort();

    this.logger?.debug(`Found ${yamlFiles.length} template files in ${dirPath}`);

    const templates: LoadedTemplate[] = [];

    for (const file of yamlFiles) {
      try {
        templates.push(await this.loadTemplate(join(dirPath, file)));
      } catch (error) {
        // Keep loading the rest of the directory
        this.logger?.warn(`Skipping invalid template: ${file}`, {
          error: error instanceof Error ? error.message : 'Unknown',
        });
      }
    }

    return templates;
  }

  /**
   * Load templates and register them as masters
   *
   * A file whose name is already registered replaces the earlier master.
   *
   * @returns Number of templates registered
   */
  async loadAndRegister(dirPath: string, registry: TemplateSink): Promise<number> {
    const templates = await this.loadFromDirectory(dirPath);

    for (const { name, template } of templates) {
      registry.register(name, template);
    }

    this.logger?.info(`Loaded ${templates.length} templates from ${dirPath}`);

    return templates.length;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
