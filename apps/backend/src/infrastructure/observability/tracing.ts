// =============================================================================
// OpenTelemetry - SDK Initialization
// =============================================================================
// Starts the OpenTelemetry Node SDK for the embedding pipeline. Call
// initTelemetry() from the process entry point before building the pipeline
// so spans from the first request are captured.

import { NodeSDK } from '@opentelemetry/sdk-node';
import { ConsoleSpanExporter, SimpleSpanProcessor, BatchSpanProcessor } from '@opentelemetry/sdk-trace-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { Resource } from '@opentelemetry/resources';
import {
  SEMRESATTRS_SERVICE_NAME,
  SEMRESATTRS_SERVICE_VERSION,
  SEMRESATTRS_DEPLOYMENT_ENVIRONMENT,
} from '@opentelemetry/semantic-conventions';
import { diag, DiagConsoleLogger, DiagLogLevel } from '@opentelemetry/api';
import type { TelemetryConfig } from '../config/index.js';
import { logger } from '../logging/logger.js';

// =============================================================================
// SDK Instance
// =============================================================================

let sdk: NodeSDK | null = null;

const log = logger.child({ component: 'telemetry' });

// =============================================================================
// Initialize
// =============================================================================

/**
 * Start the OpenTelemetry SDK.
 *
 * - Disabled telemetry returns null and registers nothing.
 * - With an OTLP endpoint spans go to `${endpoint}/v1/traces`, otherwise to the console.
 * - Production batches spans; other environments export immediately.
 *
 * Calling it again while the SDK is running returns the running instance.
 */
export function initTelemetry(config: TelemetryConfig, environment: string): NodeSDK | null {
  if (!config.enabled) {
    log.info('OpenTelemetry tracing is disabled');
    return null;
  }

  if (sdk) {
    return sdk;
  }

  if (config.debug) {
    diag.setLogger(new DiagConsoleLogger(), DiagLogLevel.DEBUG);
  }

  const resource = new Resource({
    [SEMRESATTRS_SERVICE_NAME]: config.serviceName,
    [SEMRESATTRS_SERVICE_VERSION]: config.serviceVersion,
    [SEMRESATTRS_DEPLOYMENT_ENVIRONMENT]: environment,
  });

  const exporter = config.exporterEndpoint
    ? new OTLPTraceExporter({ url: `${config.exporterEndpoint}/v1/traces` })
    : new ConsoleSpanExporter();

  const spanProcessor = environment === 'production'
    ? new BatchSpanProcessor(exporter, {
        maxQueueSize: 2048,
        maxExportBatchSize: 512,
        scheduledDelayMillis: 5000,
      })
    : new SimpleSpanProcessor(exporter);

  sdk = new NodeSDK({ resource, spanProcessor });
  sdk.start();

  log.info('OpenTelemetry initialized', {
    exporter: config.exporterEndpoint ? 'OTLP' : 'Console',
    environment,
  });

  return sdk;
}

// =============================================================================
// Shutdown
// =============================================================================

/**
 * Flush pending spans and stop the SDK. Safe to call when it never started.
 */
export async function shutdownTelemetry(): Promise<void> {
  if (!sdk) {
    return;
  }

  const running = sdk;
  sdk = null;
  try {
    await running.shutdown();
    log.info('OpenTelemetry SDK shut down');
  } catch (error) {
    log.error('Error shutting down OpenTelemetry SDK', error);
  }
}
