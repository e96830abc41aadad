import * as dgram from 'node:dgram';

import { createModuleLogger, errorMessage } from '@media-cast/dlna-core';

const logger = createModuleLogger('localAddress');

export const FALLBACK_ADDRESS = '127.0.0.1';

/**
 * @hebrew מוצא את כתובת ה-IPv4 של הממשק היוצא: "connect" של שקע UDP לכתובת חיצונית
 * קובע את נתיב הניתוב בלי לשלוח אף חבילה. בכל כשל מוחזרת 127.0.0.1.
 */
export function detectOutboundAddress(probeHost = '8.8.8.8', probePort = 80): Promise<string> {
  return new Promise<string>((resolve) => {
    const socket = dgram.createSocket('udp4');
    let settled = false;
    const finish = (address: string) => {
      if (settled) {
        return;
      }
      settled = true;
      socket.close();
      resolve(address);
    };

    socket.on('error', (err) => {
      logger.debug(`Outbound address probe failed: ${err.message}`);
      finish(FALLBACK_ADDRESS);
    });

    try {
      socket.connect(probePort, probeHost, () => {
        try {
          finish(socket.address().address);
        } catch (error: unknown) {
          logger.debug(`Could not read the probe socket address: ${errorMessage(error)}`);
          finish(FALLBACK_ADDRESS);
        }
      });
    } catch (error: unknown) {
      logger.debug(`Outbound address probe failed: ${errorMessage(error)}`);
      finish(FALLBACK_ADDRESS);
    }
  });
}
