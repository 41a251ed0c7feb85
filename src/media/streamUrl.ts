export const MEDIA_STREAM_PATH_PREFIX = '/v1/voice/stream/';

/** Provider-facing WebSocket URL for a stream id, derived from the public base URL. */
export function buildMediaStreamUrl(publicBaseUrl: string, streamId: string, token: string): string {
  const trimmedBase = publicBaseUrl.replace(/\/$/, '');
  let wsBase = trimmedBase;
  if (trimmedBase.startsWith('https://')) {
    wsBase = `wss://${trimmedBase.slice('https://'.length)}`;
  } else if (trimmedBase.startsWith('http://')) {
    wsBase = `ws://${trimmedBase.slice('http://'.length)}`;
  } else if (!trimmedBase.startsWith('ws://') && !trimmedBase.startsWith('wss://')) {
    wsBase = `wss://${trimmedBase}`;
  }
  return `${wsBase}${MEDIA_STREAM_PATH_PREFIX}${encodeURIComponent(streamId)}?token=${encodeURIComponent(token)}`;
}

/** Stream id and token from an upgrade request URL, or null when the path is not a media stream. */
export function parseMediaStreamPath(rawUrl: string | undefined, host = 'localhost'): { streamId: string; token: string | null } | null {
  if (!rawUrl) {
    return null;
  }

  const url = new URL(rawUrl, `http://${host}`);
  if (!url.pathname.startsWith(MEDIA_STREAM_PATH_PREFIX)) {
    return null;
  }

  const streamId = decodeURIComponent(url.pathname.slice(MEDIA_STREAM_PATH_PREFIX.length));
  if (!streamId || streamId.includes('/')) {
    return null;
  }

  return { streamId, token: url.searchParams.get('token') };
}
