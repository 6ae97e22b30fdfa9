import { Configuration } from '../services/Configuration';
import { Logger } from '../services/Logger';
import { AxiosHttpTransport } from '../services/AxiosHttpTransport';
import { HonestMarkClient } from '../services/DocumentClient';
import { IDocumentService, IHttpTransport, ILogger } from '../interfaces/services';

// Small typed service registry; singletons are created lazily on first get()
export class DIContainer<TServices> {
  private factories: { [K in keyof TServices]?: () => TServices[K] } = {};

  register<K extends keyof TServices>(name: K, factory: () => TServices[K], singleton: boolean = true): void {
    if (!singleton) {
      this.factories[name] = factory;
      return;
    }

    let instance: { value: TServices[K] } | undefined;
    this.factories[name] = () => {
      if (!instance) {
        instance = { value: factory() };
      }
      return instance.value;
    };
  }

  get<K extends keyof TServices>(name: K): TServices[K] {
    const factory = this.factories[name];
    if (!factory) {
      throw new Error(`Service ${String(name)} not registered`);
    }
    return factory();
  }

  has(name: keyof TServices): boolean {
    return this.factories[name] !== undefined;
  }
}

export interface ApplicationServices {
  config: Configuration;
  logger: ILogger;
  transport: IHttpTransport;
  documentClient: IDocumentService;
}

export class ApplicationContainer {
  private container: DIContainer<ApplicationServices>;
  private initialized = false;
  private documentClient?: IDocumentService;
  private transport?: IHttpTransport;

  constructor(private readonly configuration: Configuration = new Configuration()) {
    this.container = new DIContainer<ApplicationServices>();
  }

  initialize(): void {
    if (this.initialized) return;

    this.container.register('config', () => this.configuration);

    this.container.register('logger', () => {
      const config = this.container.get('config');
      return Logger.create('document-client', {
        level: config.getLogLevel(),
        logToFile: config.shouldLogToFile()
      });
    });

    this.container.register('transport', () => {
      this.transport = new AxiosHttpTransport({
        timeout: this.container.get('config').getRequestTimeout(),
        logger: this.container.get('logger')
      });
      return this.transport;
    });

    this.container.register('documentClient', () => {
      const config = this.container.get('config');
      this.documentClient = new HonestMarkClient(
        {
          timeUnit: config.getTimeUnit(),
          requestLimit: config.getRequestLimit(),
          authToken: config.getAuthToken(),
          apiUrl: config.getApiUrl()
        },
        {
          transport: this.container.get('transport'),
          logger: this.container.get('logger')
        }
      );
      return this.documentClient;
    });

    this.initialized = true;
  }

  getContainer(): DIContainer<ApplicationServices> {
    return this.container;
  }

  getConfiguration(): Configuration {
    return this.container.get('config');
  }

  getLogger(): ILogger {
    return this.container.get('logger');
  }

  getDocumentClient(): IDocumentService {
    return this.container.get('documentClient');
  }

  async shutdown(): Promise<void> {
    // Only release what was actually built; the client closes its own transport
    const client = this.documentClient;
    const transport = this.transport;
    if (!client && !transport) return;
    const logger = this.getLogger();

    try {
      if (client) {
        await client.close();
      } else if (transport) {
        await transport.close();
      }
      logger.info('Application shutdown completed');
    } catch (error) {
      logger.error('Error during shutdown:', error);
      throw error;
    }
  }
}
