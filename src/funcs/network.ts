// src/funcs/network.ts

import { z } from 'zod';

const ipSchema = z.string().ip();
const ipv4Schema = z.string().ip({ version: 'v4' });

/** IPv4 or IPv6 address. */
export function isValidIP(ip: string): boolean {
  return ipSchema.safeParse(ip).success;
}

/** `ip:port` with an IPv4 address and a port in 1..65535. */
export function isValidIPPort(ipPort: string): boolean {
  const parts = ipPort.split(':');
  if (parts.length !== 2) {
    return false;
  }

  const [ip, port] = parts;
  if (!ipv4Schema.safeParse(ip).success || !/^[0-9]+$/.test(port)) {
    return false;
  }

  const portNum = Number(port);
  return portNum >= 1 && portNum <= 65535;
}
