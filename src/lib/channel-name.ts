const CHANNEL_NAME = /^[A-Za-z0-9_.-]+$/;

export function toChannelName(handle: string): string {
  const name = handle.trim().replace(/^@/, '');
  if (!CHANNEL_NAME.test(name) || name === '.' || name === '..') {
    throw new Error(`Invalid channel name: ${handle}`);
  }
  return name;
}
