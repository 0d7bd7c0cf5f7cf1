export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  name: string;
  connectionLimit: number;
  connectTimeoutMs: number;
}

export interface MappingConfig {
  requiredColumn: string;
  primaryKey: string;
  registryTable: string;
}

export interface ProcessingConfig {
  dateColumn?: string;
}

export interface AppConfig {
  nodeEnv: string;
  port: number;
  corsOrigin?: string;
  maxUploadSize: number;
  database: DatabaseConfig;
  mapping: MappingConfig;
  processing: ProcessingConfig;
  logLevel: string;
}

export default (): AppConfig => ({
  // Application
  nodeEnv: process.env.NODE_ENV || 'development',
  port: parseInt(process.env.PORT || '8081', 10),
  corsOrigin: process.env.CORS_ORIGIN || undefined,
  maxUploadSize: parseInt(process.env.MAX_UPLOAD_SIZE || '104857600', 10), // 100MB default

  // Database
  database: {
    host: process.env.MYSQL_HOST || 'localhost',
    port: parseInt(process.env.MYSQL_PORT || '3306', 10),
    user: process.env.MYSQL_USER || 'root',
    password: process.env.MYSQL_PASSWORD || '',
    name: process.env.MYSQL_DATABASE || 'etl',
    connectionLimit: parseInt(process.env.MYSQL_CONNECTION_LIMIT || '10', 10),
    connectTimeoutMs: parseInt(process.env.MYSQL_CONNECT_TIMEOUT_MS || '10000', 10),
  },

  // Mapping uploads
  mapping: {
    requiredColumn: process.env.MAPPING_REQUIRED_COLUMN || 'tpa_id',
    primaryKey: process.env.MAPPING_PRIMARY_KEY || 'mapping_id',
    registryTable: process.env.MAPPING_REGISTRY_TABLE || 'mapping_table',
  },

  // Target table processing
  processing: {
    dateColumn: process.env.PROCESSING_DATE_COLUMN || undefined,
  },

  logLevel: process.env.LOG_LEVEL || 'info',
});
