/**
 * Dependency injection container for OutputCheck services.
 *
 * Provides:
 * - Centralized service configuration
 * - Lazy initialization
 * - Easy mocking for tests
 */

import type { OutputCheckConfig } from '../config/index.js';
import type { ContentValidator } from '../engines/content-validator.js';
import type { SemanticService } from '../engines/semantic-service.js';
import type { SchemaRepository } from '../repository/index.js';

/**
 * Overrides applied on top of the loaded configuration
 */
export type ServiceConfig = Partial<OutputCheckConfig>;

export interface Services {
  config: OutputCheckConfig;
  repository: SchemaRepository;
  /** null when the semantic pass is switched off */
  semanticService: SemanticService | null;
  validator: ContentValidator;
}

export interface ServiceFactories {
  loadConfig: () => OutputCheckConfig;
  createRepository: (config: OutputCheckConfig) => SchemaRepository;
  createSemanticService: (config: OutputCheckConfig) => SemanticService | null;
  createValidator: (
    config: OutputCheckConfig,
    repository: SchemaRepository,
    semanticService: SemanticService | null
  ) => ContentValidator;
}

let defaultFactories: ServiceFactories | null = null;

/**
 * Get default factories (lazy loaded to avoid circular imports)
 */
async function getDefaultFactories(): Promise<ServiceFactories> {
  if (!defaultFactories) {
    const [
      { loadConfig },
      { FileSchemaRepository },
      { createClient },
      { HttpSemanticService, LLMSemanticService, UnavailableSemanticService },
      { SemanticValidator },
      { ContentValidator },
    ] = await Promise.all([
      import('../config/index.js'),
      import('../repository/index.js'),
      import('../engines/llm-client.js'),
      import('../engines/semantic-service.js'),
      import('../engines/semantic-validator.js'),
      import('../engines/content-validator.js'),
    ]);

    defaultFactories = {
      loadConfig: () => loadConfig(),
      createRepository: (config) => new FileSchemaRepository(config.schemaDir),
      createSemanticService: (config) => {
        if (!config.semanticEnabled) {
          return null;
        }
        if (config.semanticUrl) {
          return new HttpSemanticService({ url: config.semanticUrl });
        }
        if (config.anthropicApiKey) {
          return new LLMSemanticService(
            createClient({ anthropicApiKey: config.anthropicApiKey, model: config.model })
          );
        }
        return new UnavailableSemanticService();
      },
      createValidator: (config, repository, semanticService) =>
        new ContentValidator({
          repository,
          semantic: semanticService
            ? new SemanticValidator({ service: semanticService, timeoutMs: config.semanticTimeoutMs })
            : null,
          compileOptions: {
            nameFieldAliases: config.nameFieldAliases,
            nameHeuristic: config.nameHeuristic,
          },
          strictFieldsByDefault: config.strictFields,
          semanticEnabled: config.semanticEnabled,
        }),
    };
  }
  return defaultFactories;
}

/**
 * Service container that manages service lifecycles
 */
export class ServiceContainer {
  private services: Partial<Services> = {};
  private overrides: ServiceConfig;
  private factories: ServiceFactories | null = null;
  private customFactories: Partial<ServiceFactories> = {};

  constructor(overrides: ServiceConfig = {}) {
    this.overrides = overrides;
  }

  /**
   * Override a factory for testing
   */
  setFactory<K extends keyof ServiceFactories>(key: K, factory: ServiceFactories[K]): this {
    this.customFactories[key] = factory;
    this.factories = null;
    this.clear();
    return this;
  }

  async getConfig(): Promise<OutputCheckConfig> {
    if (!this.services.config) {
      const factories = await this.getFactories();
      this.services.config = { ...factories.loadConfig(), ...this.overrides };
    }
    return this.services.config;
  }

  async getRepository(): Promise<SchemaRepository> {
    if (!this.services.repository) {
      const [factories, config] = await Promise.all([this.getFactories(), this.getConfig()]);
      this.services.repository = factories.createRepository(config);
    }
    return this.services.repository;
  }

  async getSemanticService(): Promise<SemanticService | null> {
    if (this.services.semanticService === undefined) {
      const [factories, config] = await Promise.all([this.getFactories(), this.getConfig()]);
      this.services.semanticService = factories.createSemanticService(config);
    }
    return this.services.semanticService;
  }

  async getValidator(): Promise<ContentValidator> {
    if (!this.services.validator) {
      const [factories, config, repository, semanticService] = await Promise.all([
        this.getFactories(),
        this.getConfig(),
        this.getRepository(),
        this.getSemanticService(),
      ]);
      this.services.validator = factories.createValidator(config, repository, semanticService);
    }
    return this.services.validator;
  }

  /**
   * Get all services (for tool handlers)
   */
  async getAll(): Promise<Services> {
    const config = await this.getConfig();
    const [repository, semanticService, validator] = await Promise.all([
      this.getRepository(),
      this.getSemanticService(),
      this.getValidator(),
    ]);
    return { config, repository, semanticService, validator };
  }

  /**
   * Clear all services (for cleanup/testing)
   */
  clear(): void {
    this.services = {};
  }

  /**
   * Update configuration; services are rebuilt on next access
   */
  configure(overrides: ServiceConfig): this {
    this.overrides = { ...this.overrides, ...overrides };
    this.clear();
    return this;
  }

  private async getFactories(): Promise<ServiceFactories> {
    if (!this.factories) {
      const defaults = await getDefaultFactories();
      this.factories = {
        ...defaults,
        ...this.customFactories,
      };
    }
    return this.factories;
  }
}

let globalContainer: ServiceContainer | null = null;

export function getContainer(): ServiceContainer {
  if (!globalContainer) {
    globalContainer = new ServiceContainer();
  }
  return globalContainer;
}

/**
 * Create a new container (useful for testing)
 */
export function createContainer(overrides?: ServiceConfig): ServiceContainer {
  return new ServiceContainer(overrides);
}

export function resetContainer(): void {
  if (globalContainer) {
    globalContainer.clear();
  }
  globalContainer = null;
}
