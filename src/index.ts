import { MQTTInboundAdapter } from '@adapter/MQTTInboundAdapter';
import { ConnectionMonitor } from '@diagnostics/ConnectionMonitor';
import { LoggingMessageConsumer } from '@messaging/LoggingMessageConsumer';
import { DefaultMessageConverter } from '@messaging/MessageConverter';
import { DefaultMQTTClientFactory } from '@mqtt/DefaultMQTTClientFactory';
import { logError, logInfo, logWarn } from '@utils/logger';
import { DEFAULT_OPTIONS_PATH, loadOptions } from '@utils/options';

let exiting = false;
const processExit = (exitCode: number) => {
  if (exiting) return;
  exiting = true;
  if (exitCode > 0) logError(`Exit code: ${exitCode}`);
  process.exit(exitCode);
};

process.on('exit', (code) => logWarn(`Shutting down mqtt-inbound-adapter... (code=${code})`));
process.on('uncaughtException', (err) => {
  logError('[Main] Uncaught exception:', err);
  processExit(2);
});
// The adapter recovers from broker trouble on its own; log and keep running.
process.on('unhandledRejection', (reason) => {
  logError('[Main] Unhandled promise rejection:', reason);
});

const start = async () => {
  const optionsPath = process.env.MQTT_ADAPTER_OPTIONS || DEFAULT_OPTIONS_PATH;
  const options = (() => {
    try {
      return loadOptions(optionsPath);
    } catch {
      // loadOptions has already logged what is wrong with the file.
      return undefined;
    }
  })();
  if (!options) return processExit(1);

  const clientFactory = new DefaultMQTTClientFactory(options.connection, options.stopAction, options.completionTimeout);
  const monitor = new ConnectionMonitor(options.clientId);
  const adapter = new MQTTInboundAdapter({
    url: options.url,
    clientId: options.clientId,
    clientFactory,
    topics: options.topics,
    consumer: new LoggingMessageConsumer(),
    converter: new DefaultMessageConverter({ payloadAsBytes: options.payloadAsBytes }),
    eventPublisher: monitor,
    completionTimeout: options.completionTimeout,
    recoveryInterval: options.recoveryInterval,
  });

  const shutdown = async () => {
    try {
      await adapter.stop();
      logInfo(`[Main] Stopped; health at shutdown: ${JSON.stringify(monitor.snapshot())}`);
      processExit(0);
    } catch (error) {
      logError('[Main] Error while stopping adapter', error);
      processExit(1);
    }
  };
  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());

  await adapter.start();
  logInfo(`[Main] ${options.clientId} running with topics ${JSON.stringify(adapter.getTopics())}`);
};
void start();
