/**
 * Address and port synthesis for node endpoints.
 */

export const BASE_PORT = 8000;

export type TransportProtocol = "tcp" | "udp";

/**
 * Strips the wildcard part of a network prefix: `"10.0.1.*"` -> `"10.0.1"`.
 */
export function networkBase(prefix: string): string {
  const [head] = prefix.trim().split("*");
  return head.replace(/\.+$/, "");
}

/**
 * Host address of the node with the given ordered index inside a network.
 *
 * @example synthesizeAddress(2, "10.0.1.*") === "10.0.1.3"
 */
export function synthesizeAddress(index: number, prefix: string): string {
  return `${networkBase(prefix)}.${index + 1}`;
}

/**
 * Listen port of the node with the given ordered index.
 */
export function synthesizePort(index: number): number {
  return BASE_PORT + index;
}

export function formatListenEndpoint(
  address: string,
  port: number,
  protocol: TransportProtocol = "tcp"
): string {
  return `${protocol}/${address}:${port}`;
}
