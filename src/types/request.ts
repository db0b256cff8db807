export interface CacheRequest {
  readonly kind: 'cache';
  readonly url: string;
  readonly recache: boolean;
  readonly report: boolean;
  readonly output?: string;
}

export interface InstallRequest {
  readonly kind: 'install';
  readonly package: string;
  readonly version: string;
  /** Overrides the detected platform when set. */
  readonly platform?: string;
  readonly x32: boolean;
  readonly baseUrl?: string;
  /** Relative paths resolve against the working directory; default `install`. */
  readonly installDir?: string;
  readonly configFile?: string;
  readonly cacheOnly: boolean;
  readonly recache: boolean;
  readonly report: boolean;
  readonly output?: string;
}

export interface PlatformRequest {
  readonly kind: 'platform';
}

export interface ListRequest {
  readonly kind: 'list';
  readonly configFile?: string;
}

export type InvocationRequest = CacheRequest | InstallRequest | PlatformRequest | ListRequest;
