#!/usr/bin/env node
import { resolveConfig } from '../config';
import { describeError } from '../errors';
import { StructuredLogger } from '../logging/StructuredLogger';
import { sendCommand } from '../services/commands/CommandClient';
import { HotkeyBridge } from '../services/hotkey/HotkeyBridge';
import { DEFAULT_HOTKEYS, parseBindings } from '../services/hotkey/hotkeyBindings';

const main = async (): Promise<void> => {
  const config = resolveConfig();
  const logger = await StructuredLogger.create(config.logDir, { scope: 'hotkeys' });
  const bindings = parseBindings(config.hotkeys.length > 0 ? config.hotkeys : DEFAULT_HOTKEYS);

  const bridge = new HotkeyBridge(
    bindings,
    async (command) => {
      const { reply } = await sendCommand(command, { host: config.host, port: config.port });
      if (reply.ok) {
        logger.info('Command sent', { command, state: reply.state, detail: reply.detail });
      } else {
        logger.warn('Command rejected', { command, state: reply.state, detail: reply.detail });
      }
    },
    logger
  );

  await bridge.start();
  process.stdout.write(`Listening for hotkeys: ${bridge.describeBindings().join(', ')}\n`);

  const shutdown = (): void => {
    bridge.stop();
    logger
      .flush()
      .then(() => {
        process.exit(0);
      })
      .catch(() => {
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
};

main().catch((error: unknown) => {
  process.stderr.write(`longscribe-hotkeys: ${describeError(error)}\n`);
  process.exit(1);
});
