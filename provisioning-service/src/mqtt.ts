import { connect, type IClientOptions } from 'mqtt';
import { SERVICE } from './config.js';

// Map MQTT CONNACK reason codes to human-readable text (MQTT v5 and MQTT v3.1.1)
export function connackReasonText(code: number): string {
  const v5: Record<number, string> = {
    0: 'Success',
    128: 'Unspecified error',
    133: 'Client Identifier not valid',
    134: 'Bad User Name or Password',
    135: 'Not authorized',
    136: 'Server unavailable',
    137: 'Server busy',
  };
  const v3: Record<number, string> = {
    0: 'Connection Accepted',
    1: 'Unacceptable protocol version',
    2: 'Identifier rejected',
    3: 'Server unavailable',
    4: 'Bad user name or password',
    5: 'Not authorized',
  };
  return v5[code] || v3[code] || `Unknown (${code})`;
}

/**
 * Connect to the ThingsBoard MQTT transport with a device access token as the
 * username. ThingsBoard refuses the CONNECT for unknown tokens, so a
 * successful connection proves the token is bound to a device.
 */
export function verifyDeviceToken(url: string, token: string, timeoutMs = 10000): Promise<void> {
  const options: IClientOptions = {
    username: token,
    clientId: `${SERVICE}-verify-${Math.random().toString(36).slice(2, 8)}`,
    reconnectPeriod: 0,
    connectTimeout: timeoutMs,
    clean: true,
  };
  return new Promise<void>((resolve, reject) => {
    const client = connect(url, options);
    let settled = false;
    const finish = (err?: Error) => {
      if (settled) return;
      settled = true;
      client.end(true);
      if (err) reject(err);
      else resolve();
    };
    client.once('connect', () => finish());
    client.once('error', (err: Error) => {
      const code = 'code' in err && typeof err.code === 'number' ? err.code : undefined;
      finish(new Error(code === undefined ? err.message : `${connackReasonText(code)} (${code})`));
    });
    // reconnectPeriod 0: a close before CONNACK is final
    client.once('close', () => finish(new Error(`connection to ${url} closed before CONNACK`)));
  });
}
