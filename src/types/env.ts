// Environment variables read by the service

export interface Env {
  // Page packages: "packageId=Namespace.Root,otherPackage=Other.Root"
  PAGE_PACKAGES?: string;
  ALLOW_FILESYSTEM_PAGES?: string;

  // Filesystem layout
  APP_ROOT?: string;
  PACKAGES_PATH?: string;
  PAGE_CACHE_DIR?: string;

  // Server
  PORT?: string;
  HOST?: string;
  LOG_LEVEL?: 'debug' | 'info' | 'warn' | 'error';

  // Responses
  CACHE_CONTROL?: string;
}
