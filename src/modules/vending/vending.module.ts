import { DynamicModule, Global, Module, Provider } from '@nestjs/common';
import {
  VendingModuleAsyncConfig,
  VendingModuleConfig,
  mergeVendingConfig,
} from './vending.config';
import {
  ActuatorMap,
  BackgroundTaskRunner,
  ConfigurationError,
  DEFAULT_HARDWARE_LAYOUT_PATH,
  DispenseController,
  EventDispatcher,
  EventDispatcherImpl,
  IdempotencyLedger,
  LoggingEventHandler,
  MetricsEventHandler,
  PaymentProviderAdapter,
  PinDriver,
  RelayDriver,
  WebhookProcessor,
  loadHardwareLayout,
} from '../../core';
import { MockProviderAdapter } from '../../adapters/providers/mock';
import { SquareProviderAdapter } from '../../adapters/providers/square';
import { MemoryIdempotencyLedger } from '../../adapters/storage/memory';
import {
  TypeORMIdempotencyLedger,
  createDataSource,
} from '../../adapters/storage/typeorm';
import { SimulatedPinDriver } from '../../adapters/gpio/simulated';
import {
  ACTUATOR_MAP,
  DISPENSE_CONTROLLER,
  EVENT_DISPATCHER,
  IDEMPOTENCY_LEDGER,
  METRICS_HANDLER,
  PAYMENT_PROVIDER,
  PIN_DRIVER,
  RELAY_DRIVER,
  TASK_RUNNER,
  VENDING_CONFIG,
  WEBHOOK_PROCESSOR,
} from './constants';
import { WebhookController } from './controllers/webhook.controller';
import { HealthController } from './controllers/health.controller';
import { MaintenanceController } from './controllers/maintenance.controller';
import { MaintenanceAuthGuard } from './guards/maintenance-auth.guard';
import { VendingService } from './services/vending.service';
import { ConfigurationService } from './services/configuration.service';
import { VendingLifecycleService } from './services/vending-lifecycle.service';

const EXPORTED_TOKENS = [
  VENDING_CONFIG,
  EVENT_DISPATCHER,
  PAYMENT_PROVIDER,
  IDEMPOTENCY_LEDGER,
  RELAY_DRIVER,
  DISPENSE_CONTROLLER,
  WEBHOOK_PROCESSOR,
  VendingService,
];

/**
 * Vending Module - Main NestJS Module
 *
 * Wires the webhook pipeline, the order ledger and the relay hardware.
 * Hardware is claimed while the module initializes: a failure aborts
 * application bootstrap.
 */
@Global()
@Module({})
export class VendingModule {
  /**
   * Configure the module synchronously
   */
  static forRoot(config: VendingModuleConfig): DynamicModule {
    return {
      module: VendingModule,
      providers: [
        {
          provide: VENDING_CONFIG,
          useValue: mergeVendingConfig(config),
        },
        ...this.createProviders(),
      ],
      controllers: [WebhookController, HealthController, MaintenanceController],
      exports: EXPORTED_TOKENS,
    };
  }

  /**
   * Configure the module asynchronously
   */
  static forRootAsync(options: VendingModuleAsyncConfig): DynamicModule {
    return {
      module: VendingModule,
      imports: options.imports || [],
      providers: [
        {
          provide: VENDING_CONFIG,
          useFactory: async (...args: unknown[]) =>
            mergeVendingConfig(await options.useFactory(...args)),
          inject: options.inject || [],
        },
        ...this.createProviders(),
      ],
      controllers: [WebhookController, HealthController, MaintenanceController],
      exports: EXPORTED_TOKENS,
    };
  }

  /**
   * Providers that depend on the resolved configuration
   */
  private static createProviders(): Provider[] {
    return [
      {
        provide: METRICS_HANDLER,
        useFactory: (config: VendingModuleConfig) =>
          config.events?.enableMetrics ? new MetricsEventHandler() : null,
        inject: [VENDING_CONFIG],
      },
      {
        provide: EVENT_DISPATCHER,
        useFactory: (
          config: VendingModuleConfig,
          metricsHandler: MetricsEventHandler | null,
        ): EventDispatcher => {
          const dispatcher = config.events?.dispatcher || new EventDispatcherImpl();

          if (config.events?.enableLogging) {
            const loggingHandler = new LoggingEventHandler(
              undefined,
              config.events.logLevel,
            );
            dispatcher.onAll(loggingHandler.getHandler());
          }

          if (metricsHandler) {
            dispatcher.onAll(metricsHandler.getHandler());
          }

          for (const { eventType, handler } of config.events?.handlers ?? []) {
            dispatcher.on(eventType, handler);
          }

          return dispatcher;
        },
        inject: [VENDING_CONFIG, METRICS_HANDLER],
      },
      {
        provide: PAYMENT_PROVIDER,
        useFactory: (config: VendingModuleConfig): PaymentProviderAdapter =>
          this.createPaymentProvider(config),
        inject: [VENDING_CONFIG],
      },
      {
        provide: IDEMPOTENCY_LEDGER,
        useFactory: (config: VendingModuleConfig): Promise<IdempotencyLedger> =>
          this.createLedger(config),
        inject: [VENDING_CONFIG],
      },
      {
        provide: ACTUATOR_MAP,
        useFactory: (config: VendingModuleConfig) =>
          ActuatorMap.fromLayout(
            config.hardware.layout ??
              loadHardwareLayout(
                config.hardware.layoutPath ?? DEFAULT_HARDWARE_LAYOUT_PATH,
              ),
          ),
        inject: [VENDING_CONFIG],
      },
      {
        provide: PIN_DRIVER,
        useFactory: (config: VendingModuleConfig): Promise<PinDriver> =>
          this.createPinDriver(config),
        inject: [VENDING_CONFIG],
      },
      {
        provide: RELAY_DRIVER,
        useFactory: (pinDriver: PinDriver, actuatorMap: ActuatorMap) => {
          const relayDriver = new RelayDriver(pinDriver, actuatorMap.bindings);
          relayDriver.configure();
          return relayDriver;
        },
        inject: [PIN_DRIVER, ACTUATOR_MAP],
      },
      {
        provide: TASK_RUNNER,
        useFactory: () => new BackgroundTaskRunner(),
      },
      {
        provide: DISPENSE_CONTROLLER,
        useFactory: (
          config: VendingModuleConfig,
          actuatorMap: ActuatorMap,
          relayDriver: RelayDriver,
          tasks: BackgroundTaskRunner,
          eventDispatcher: EventDispatcher,
        ) =>
          new DispenseController(actuatorMap, relayDriver, tasks, eventDispatcher, {
            dwellMs: config.hardware.dwellMs,
          }),
        inject: [VENDING_CONFIG, ACTUATOR_MAP, RELAY_DRIVER, TASK_RUNNER, EVENT_DISPATCHER],
      },
      {
        provide: WEBHOOK_PROCESSOR,
        useFactory: (
          configService: ConfigurationService,
          provider: PaymentProviderAdapter,
          ledger: IdempotencyLedger,
          dispenseController: DispenseController,
          tasks: BackgroundTaskRunner,
          eventDispatcher: EventDispatcher,
        ) =>
          new WebhookProcessor({
            provider,
            ledger,
            dispenseController,
            tasks,
            eventDispatcher,
            signatureKeys: configService.getSignatureKeys(),
            resolutionTimeoutMs: configService.getResolutionTimeoutMs(),
          }),
        inject: [
          ConfigurationService,
          PAYMENT_PROVIDER,
          IDEMPOTENCY_LEDGER,
          DISPENSE_CONTROLLER,
          TASK_RUNNER,
          EVENT_DISPATCHER,
        ],
      },
      ConfigurationService,
      VendingService,
      VendingLifecycleService,
      MaintenanceAuthGuard,
    ];
  }

  private static createPaymentProvider(
    config: VendingModuleConfig,
  ): PaymentProviderAdapter {
    const { adapter, keys, options } = config.provider;

    if (typeof adapter !== 'string') {
      return adapter;
    }

    switch (adapter) {
      case 'square':
        return new SquareProviderAdapter({
          accessToken: keys?.accessToken,
          options: {
            apiBaseUrl: options?.apiUrl,
            apiVersion: options?.apiVersion,
            timeout: options?.apiTimeout,
            notificationUrl: options?.notificationUrl,
          },
        });
      case 'mock':
        return new MockProviderAdapter(
          options?.notificationUrl ? { notificationUrl: options.notificationUrl } : {},
        );
      default:
        throw new ConfigurationError(
          `Unknown provider adapter: ${String(adapter)}`,
          'vending-module',
        );
    }
  }

  private static async createLedger(
    config: VendingModuleConfig,
  ): Promise<IdempotencyLedger> {
    const { type, retentionMs } = config.ledger;

    switch (type) {
      case 'memory':
        return new MemoryIdempotencyLedger({ retentionMs });

      case 'typeorm': {
        const dataSource =
          config.ledger.dataSource ?? createDataSource(config.ledger.options);
        if (!dataSource.isInitialized) {
          await dataSource.initialize();
        }
        return new TypeORMIdempotencyLedger(dataSource, { retentionMs });
      }

      case 'custom':
        if (!config.ledger.adapter) {
          throw new ConfigurationError(
            'Custom ledger adapter not provided',
            'vending-module',
          );
        }
        return config.ledger.adapter;

      default:
        throw new ConfigurationError(
          `Unknown ledger type: ${String(type)}`,
          'vending-module',
        );
    }
  }

  private static async createPinDriver(
    config: VendingModuleConfig,
  ): Promise<PinDriver> {
    const driver = config.hardware.driver;

    if (typeof driver !== 'string') {
      return driver;
    }

    switch (driver) {
      case 'simulated':
        return new SimulatedPinDriver();
      case 'onoff': {
        // Loaded on demand: the GPIO bindings only exist on the kiosk
        const { OnoffPinDriver } = await import('../../adapters/gpio/onoff');
        return new OnoffPinDriver();
      }
      default:
        throw new ConfigurationError(
          `Unknown GPIO driver: ${String(driver)}`,
          'vending-module',
        );
    }
  }
}
