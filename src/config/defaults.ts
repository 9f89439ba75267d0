/**
 * mysql-advisor - Defaults
 */

export const DEFAULT_CONFIG = {
  name: "mysql-advisor",
  version: "1.0.0",
  host: "localhost",
  port: 3306,
  user: "root",
  connectTimeout: 10000,
} as const;
