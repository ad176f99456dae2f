import { EventEmitter } from 'eventemitter3';
import type { Logger, TemplateServiceConfig, TemplateServiceEvents } from './types.js';
import { createDefaultLogger } from './logger.js';
import {
  TemplateRegistry,
  TemplateLoader,
  SERVICE_CONTRACT,
  CONSULTING_CONTRACT,
  buildServiceContractTemplate,
  customizeConsultingContract,
} from './templates/index.js';
import type { DocumentTemplate } from './templates/index.js';

/**
 * What a caller usually wants to show about a template
 */
export interface TemplateDescription {
  title: string;
  category: string;
  sectionCount: number;
  requiredFields: string[];
  approvers: string[];
}

/**
 * TemplateService - builds master templates and hands out copies
 *
 * Emits `template:registered` after each registration and `template:created`
 * after each copy handed out.
 */
export class TemplateService extends EventEmitter<TemplateServiceEvents> {
  private config: TemplateServiceConfig;
  private logger: Logger;
  private registry: TemplateRegistry;

  constructor(config: TemplateServiceConfig = {}) {
    super();
    this.config = config;
    this.logger = config.logger || createDefaultLogger(config.logLevel || 'info');
    this.registry = config.registry || new TemplateRegistry(this.logger);

    if (config.builtins !== false) {
      this.registerBuiltins();
    }

    this.logger.info('TemplateService initialized', {
      templates: this.registry.size,
      templatePaths: config.templatePaths?.length || 0,
    });
  }

  /**
   * Register a master template under `name`
   *
   * The service must not mutate `template` after this call; derive a new
   * template with {@link derive} instead.
   */
  register(name: string, template: DocumentTemplate): void {
    this.registry.register(name, template);
    this.logger.debug('Template registered', { name, title: template.title });
    this.emit('template:registered', name);
  }

  /**
   * Get an independent copy of the master registered under `name`
   *
   * @throws TemplateNotFoundError if nothing is registered under `name`
   */
  create(name: string): DocumentTemplate {
    const template = this.registry.create(name);
    this.emit('template:created', name);
    return template;
  }

  /**
   * Register a new master built from a copy of an existing one
   *
   * `customize` receives the copy and may mutate it freely, including indexed
   * edits such as `template.sections[0].content = '...'`.
   *
   * @returns A copy of the newly registered master
   * @throws TemplateNotFoundError if `baseName` is not registered
   */
  derive(
    baseName: string,
    name: string,
    customize: (template: DocumentTemplate) => void
  ): DocumentTemplate {
    const template = this.registry.create(baseName);
    customize(template);
    this.register(name, template);

    this.logger.debug('Template derived', { baseName, name });

    return this.registry.create(name);
  }

  /**
   * Register the built-in contract templates
   */
  registerBuiltins(): void {
    this.register(SERVICE_CONTRACT, buildServiceContractTemplate());
    this.derive(SERVICE_CONTRACT, CONSULTING_CONTRACT, customizeConsultingContract);
  }

  /**
   * Load YAML templates and register them
   *
   * @param searchPaths - Directories to scan; defaults to `config.templatePaths`
   * @returns Number of templates registered
   */
  async loadTemplates(searchPaths?: string[]): Promise<number> {
    const paths = searchPaths || this.config.templatePaths || [];
    const loader = new TemplateLoader(this.logger);

    let totalLoaded = 0;
    for (const searchPath of paths) {
      totalLoaded += await loader.loadAndRegister(searchPath, this);
    }

    this.logger.info(`Loaded ${totalLoaded} templates`, { paths });

    return totalLoaded;
  }

  describe(template: DocumentTemplate): TemplateDescription {
    return {
      title: template.title,
      category: template.category,
      sectionCount: template.sections.length,
      requiredFields: [...template.requiredFields],
      approvers: template.workflow ? [...template.workflow.approvers] : [],
    };
  }

  /**
   * Get the underlying registry
   *
   * Registering through it skips the service events. Masters stored in it must
   * not be mutated; take copies with `create`.
   */
  getRegistry(): TemplateRegistry {
    return this.registry;
  }

  getLogger(): Logger {
    return this.logger;
  }
}
