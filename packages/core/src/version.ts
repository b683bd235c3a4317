/** Version of the host preprocessor protocol this package is written against. */
export const PROTOCOL_VERSION = '0.4.40';

function majorMinor(version: string): [number, number] | null {
  const match = /^v?(\d+)\.(\d+)/.exec(version.trim());
  if (!match) {
    return null;
  }
  return [Number(match[1]), Number(match[2])];
}

export function isCompatibleHostVersion(
  version: string,
  target: string = PROTOCOL_VERSION,
): boolean {
  const host = majorMinor(version);
  const ours = majorMinor(target);
  if (!host || !ours) {
    return false;
  }
  return host[0] === ours[0] && host[1] === ours[1];
}
