/**
 * Optional components the host application has installed. Defaults that
 * depend on them read this set; nothing is probed at run time.
 */
export type FrameworkCapabilities = {
  /** Running as the full-stack distribution, where optional features are opt-in */
  fullStack: boolean
  /** Kernel debug mode */
  debug: boolean
  /** Semaphore-based lock store is supported on this host */
  semaphoreLock: boolean
  messenger: boolean
  httpClient: boolean
  mailer: boolean
  notifier: boolean
  rateLimiter: boolean
  uid: boolean
  /** A database abstraction layer is installed */
  dbal: boolean
}

export const defaultCapabilities: FrameworkCapabilities = {
  fullStack: false,
  debug: false,
  semaphoreLock: false,
  messenger: true,
  httpClient: true,
  mailer: true,
  notifier: true,
  rateLimiter: true,
  uid: true,
  dbal: false,
}
