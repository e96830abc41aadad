// ניהול סוקט ה-UDP של חיפוש SSDP (M-SEARCH)

import * as dgram from 'node:dgram';

import { createModuleLogger } from './logger';
import { errorMessage } from './utils';

const logger = createModuleLogger('ssdpSocketManager');

export const SSDP_PORT = 1900;
export const SSDP_MULTICAST_ADDRESS_IPV4 = '239.255.255.250';
const M_SEARCH_REQUEST_START_LINE = 'M-SEARCH * HTTP/1.1';
const DEFAULT_MULTICAST_TTL = 2;

export type OnSsdpMessage = (msg: Buffer, rinfo: dgram.RemoteInfo) => void;

export interface SearchSocketOptions {
  multicastAddress?: string;
  multicastPort?: number;
  multicastTtl?: number;
  /** כתובת הממשק היוצא למולטיקאסט. בלי ערך, מערכת ההפעלה בוחרת */
  multicastInterface?: string;
  onMessage: OnSsdpMessage;
}

export interface SearchSocket {
  readonly port: number;
  sendMSearch(searchTarget: string, mx: number): Promise<void>;
  close(): Promise<void>;
}

/**
 * @hebrew בונה הודעת M-SEARCH. כותרת HOST תמיד מציינת את קבוצת ה-SSDP הסטנדרטית.
 */
export function buildMSearchMessage(searchTarget: string, mx: number): string {
  return [
    M_SEARCH_REQUEST_START_LINE,
    `HOST: ${SSDP_MULTICAST_ADDRESS_IPV4}:${SSDP_PORT}`,
    'MAN: "ssdp:discover"',
    `MX: ${mx}`,
    `ST: ${searchTarget}`,
    '',
    ''
  ].join('\r\n');
}

/**
 * @hebrew יוצר סוקט unicast יחיד (פורט זמני) שממנו נשלחות בקשות M-SEARCH ואליו מגיעות התגובות.
 * @throws אם לא ניתן לקשור את הסוקט
 */
export async function createSearchSocket(options: SearchSocketOptions): Promise<SearchSocket> {
  const multicastAddress = options.multicastAddress ?? SSDP_MULTICAST_ADDRESS_IPV4;
  const multicastPort = options.multicastPort ?? SSDP_PORT;
  const socket = dgram.createSocket({ type: 'udp4', reuseAddr: true });

  await new Promise<void>((resolve, reject) => {
    const onBindError = (err: Error) => {
      socket.close();
      reject(err);
    };
    socket.once('error', onBindError);
    socket.bind(0, '0.0.0.0', () => {
      socket.removeListener('error', onBindError);
      resolve();
    });
  });

  socket.on('error', (err) => {
    logger.warn(`SSDP search socket error: ${err.message}`);
  });
  socket.on('message', options.onMessage);

  // הגדרות מולטיקאסט הן best-effort; כשלון לא מונע שליחה
  try {
    socket.setMulticastTTL(options.multicastTtl ?? DEFAULT_MULTICAST_TTL);
    if (options.multicastInterface) {
      socket.setMulticastInterface(options.multicastInterface);
    }
  } catch (err: unknown) {
    logger.debug(`Could not apply multicast socket options: ${errorMessage(err)}`);
  }

  const port = socket.address().port;
  logger.debug(`SSDP search socket bound on 0.0.0.0:${port}, targeting ${multicastAddress}:${multicastPort}`);

  let closed = false;

  return {
    port,
    sendMSearch: (searchTarget, mx) => new Promise<void>((resolve, reject) => {
      const message = Buffer.from(buildMSearchMessage(searchTarget, mx));
      logger.trace(`Sending M-SEARCH for ST=${searchTarget}`);
      socket.send(message, 0, message.length, multicastPort, multicastAddress, (err) => {
        if (err) {
          reject(err);
          return;
        }
        resolve();
      });
    }),
    close: () => new Promise<void>((resolve) => {
      if (closed) {
        resolve();
        return;
      }
      closed = true;
      socket.close(() => resolve());
    }),
  };
}
