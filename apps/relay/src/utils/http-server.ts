/**
 * Listening helpers shared by the HTTP receiver, the Prometheus exporter and
 * the health_check extension.
 */

import type { Server } from 'http';
import type { AddressInfo } from 'net';

export interface Endpoint {
  host: string;
  port: number;
}

/** `host:port`; an empty host listens on every interface. */
export function parseEndpoint(endpoint: string): Endpoint {
  const separator = endpoint.lastIndexOf(':');
  const host = endpoint.slice(0, separator);
  return { host: host === '' ? '0.0.0.0' : host, port: parseInt(endpoint.slice(separator + 1), 10) };
}

export function listen(server: Server, endpoint: string): Promise<Endpoint> {
  const { host, port } = parseEndpoint(endpoint);

  return new Promise((resolve, reject) => {
    const onError = (error: Error): void => {
      server.off('listening', onListening);
      reject(error);
    };
    const onListening = (): void => {
      server.off('error', onError);
      resolve(boundAddress(server) ?? { host, port });
    };

    server.once('error', onError);
    server.once('listening', onListening);
    server.listen(port, host);
  });
}

export function boundAddress(server: Server): Endpoint | undefined {
  const address: AddressInfo | string | null = server.address();
  if (address === null || typeof address === 'string') {
    return undefined;
  }
  return { host: address.address, port: address.port };
}

export function closeServer(server: Server): Promise<void> {
  if (!server.listening) {
    return Promise.resolve();
  }
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
    server.closeIdleConnections();
  });
}
