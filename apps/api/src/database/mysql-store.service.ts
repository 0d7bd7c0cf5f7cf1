import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as mysql from 'mysql2/promise';
import { DatabaseConfig } from '../config/configuration';
import {
  ConnectionException,
  TableNotFoundException,
} from '../common/exceptions/etl.exceptions';
import { quoteTable } from '../common/utils/sql-identifier';
import {
  ColumnDescription,
  ExecuteResult,
  Row,
  SqlValue,
  Store,
  StoreSession,
} from './store.interface';

const ER_NO_SUCH_TABLE = 'ER_NO_SUCH_TABLE';

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export class MySqlSession implements StoreSession {
  constructor(private readonly connection: mysql.PoolConnection) {}

  async describe(table: string): Promise<ColumnDescription[]> {
    try {
      const [rows] = await this.connection.query<mysql.RowDataPacket[]>(
        `SHOW COLUMNS FROM ${quoteTable(table)}`,
      );
      return rows.map((row) => ({
        name: String(row.Field),
        declaredType: String(row.Type).toLowerCase(),
        isNullable: row.Null === 'YES',
        isPrimaryKey: row.Key === 'PRI',
        isAutoIncrement: String(row.Extra ?? '').toLowerCase().includes('auto_increment'),
      }));
    } catch (error) {
      if (errorCode(error) === ER_NO_SUCH_TABLE) {
        throw new TableNotFoundException(table);
      }
      throw error;
    }
  }

  async tableExists(table: string): Promise<boolean> {
    const [rows] = await this.connection.query<mysql.RowDataPacket[]>(
      `SELECT COUNT(*) AS count
       FROM information_schema.tables
       WHERE table_schema = DATABASE() AND table_name = ?`,
      [table],
    );
    return Number(rows[0]?.count ?? 0) > 0;
  }

  async query(sql: string, params: SqlValue[] = []): Promise<Row[]> {
    const [rows] = await this.connection.query<mysql.RowDataPacket[]>(sql, params);
    return rows;
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<ExecuteResult> {
    const [result] = await this.connection.query<mysql.ResultSetHeader>(sql, params);
    return { affectedRows: result.affectedRows, insertId: result.insertId };
  }

  async transaction<T>(work: () => Promise<T>): Promise<T> {
    await this.connection.beginTransaction();
    try {
      const result = await work();
      await this.connection.commit();
      return result;
    } catch (error) {
      await this.connection.rollback();
      throw error;
    }
  }
}

@Injectable()
export class MySqlStore implements Store, OnModuleDestroy {
  private readonly logger = new Logger(MySqlStore.name);
  private readonly pool: mysql.Pool;

  constructor(configService: ConfigService) {
    const db = configService.getOrThrow<DatabaseConfig>('database');

    this.pool = mysql.createPool({
      host: db.host,
      port: db.port,
      user: db.user,
      password: db.password,
      database: db.name,
      connectionLimit: db.connectionLimit,
      connectTimeout: db.connectTimeoutMs,
      // Dates come back as their literal text, DECIMAL as numbers
      dateStrings: true,
      decimalNumbers: true,
    });

    this.logger.log(`MySQL pool created for ${db.host}:${db.port}/${db.name}`);
  }

  async withSession<T>(work: (session: StoreSession) => Promise<T>): Promise<T> {
    let connection: mysql.PoolConnection;
    try {
      connection = await this.pool.getConnection();
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Error while connecting to MySQL: ${message}`);
      throw new ConnectionException(message);
    }

    try {
      return await work(new MySqlSession(connection));
    } finally {
      connection.release();
    }
  }

  async ping(): Promise<void> {
    await this.withSession((session) => session.query('SELECT 1'));
  }

  async onModuleDestroy() {
    await this.pool.end();
    this.logger.log('MySQL pool closed');
  }
}
