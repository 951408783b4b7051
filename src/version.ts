/**
 * Version reported in debug logs and support reports.
 */
export const APP_VERSION = "0.1.0"

export const getAppVersion = (): string => {
  return APP_VERSION
}
