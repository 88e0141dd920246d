export const CLIENT_VERSION = "0.1.0";

export function defaultUserAgent(): string {
  return `attested-chat/${CLIENT_VERSION} node/${process.version}`;
}
