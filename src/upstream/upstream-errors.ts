export type UpstreamErrorKind =
  | 'network'
  | 'http_status'
  | 'timeout'
  | 'invalid_response';

// search = library lookup; txt / json = the two documentation channels
export type UpstreamChannel = 'search' | 'txt' | 'json';

export const CHANNEL_LABELS: Record<UpstreamChannel, string> = {
  search: 'API',
  txt: 'Text API',
  json: 'JSON API',
};

export class UpstreamError extends Error {
  readonly kind: UpstreamErrorKind;
  readonly channel: UpstreamChannel;
  readonly status?: number;

  constructor(kind: UpstreamErrorKind, channel: UpstreamChannel, message: string, opts?: { status?: number }) {
    super(message);
    this.name = 'UpstreamError';
    this.kind = kind;
    this.channel = channel;
    if (opts?.status !== undefined) {
      this.status = opts.status;
    }
  }
}

export const isUpstreamError = (value: unknown): value is UpstreamError =>
  value instanceof UpstreamError;
