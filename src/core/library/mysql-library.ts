// src/core/library/mysql-library.ts
import { createPool, type Pool, type PoolConnection, type RowDataPacket } from 'mysql2/promise';
import type { MediaLibraryConfig } from '../config/app-config.js';
import { ErrorCode, LikedropError, errorMessage } from '../errors.js';
import { createAppLogger, type AppLogger } from '../logger.js';
import type { Label, MediaLibrary } from './types.js';

type QueryParams = Array<string | number | Date | Array<Array<string | number | Date>>>;

export function escapeLikePrefix(value: string): string {
  return value.replace(/[\\%_]/g, match => `\\${match}`);
}

/**
 * MediaLibrary backed by the PhotoPrism MariaDB/MySQL schema.
 */
export class MysqlMediaLibrary implements MediaLibrary {
  private pool: Pool;
  private logger: AppLogger;

  constructor(config: MediaLibraryConfig, logger?: AppLogger) {
    this.pool = createPool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      connectionLimit: 1,
    });
    this.logger = logger ?? createAppLogger('media-library');
  }

  async listLabels(): Promise<Label[]> {
    const rows = await this.select('SELECT id, label_slug FROM labels', []);
    return rows.map(row => ({ id: Number(row.id), slug: String(row.label_slug) }));
  }

  async photoIdsForAuthor(author: string): Promise<number[]> {
    const rows = await this.select('SELECT id FROM photos WHERE photo_name LIKE ?', [
      `${escapeLikePrefix(author)}\\_%`,
    ]);
    return rows.map(row => Number(row.id));
  }

  async labelIdsForPhoto(photoId: number): Promise<Set<number>> {
    const rows = await this.select('SELECT label_id FROM photos_labels WHERE photo_id = ?', [photoId]);
    return new Set(rows.map(row => Number(row.label_id)));
  }

  async addLabelToPhoto(photoId: number, label: Label): Promise<void> {
    await this.transaction(async connection => {
      await connection.query(
        "INSERT INTO photos_labels (photo_id, label_id, label_src, uncertainty) VALUES (?, ?, 'manual', 0)",
        [photoId, label.id]
      );
      await connection.query('UPDATE labels SET photo_count = photo_count + 1 WHERE id = ?', [label.id]);
    });
  }

  async albumUidsBySlug(slug: string): Promise<string[]> {
    const rows = await this.select('SELECT album_uid FROM albums WHERE album_slug = ?', [slug]);
    return rows.map(row => String(row.album_uid));
  }

  async photoUidsCreatedAfter(since: Date): Promise<string[]> {
    const rows = await this.select('SELECT photo_uid FROM photos WHERE created_at > ?', [since]);
    return rows.map(row => String(row.photo_uid));
  }

  async clearAlbum(albumUid: string): Promise<void> {
    await this.execute('DELETE FROM photos_albums WHERE album_uid = ?', [albumUid]);
  }

  async addPhotosToAlbum(albumUid: string, photoUids: string[]): Promise<void> {
    if (photoUids.length === 0) {
      this.logger.debug(`No media to add to album ${albumUid}`);
      return;
    }

    const now = new Date();
    const values = photoUids.map(uid => [uid, albumUid, 0, 0, 0, now, now]);
    await this.execute(
      'INSERT INTO photos_albums (photo_uid, album_uid, `order`, hidden, missing, created_at, updated_at) VALUES ?',
      [values]
    );
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async select(sql: string, params: QueryParams): Promise<RowDataPacket[]> {
    this.logger.debug('Executing query', { sql });
    try {
      const [rows] = await this.pool.query<RowDataPacket[]>(sql, params);
      return rows;
    } catch (error) {
      throw this.queryError(sql, error);
    }
  }

  private async execute(sql: string, params: QueryParams): Promise<void> {
    this.logger.debug('Executing query', { sql });
    try {
      await this.pool.query(sql, params);
    } catch (error) {
      throw this.queryError(sql, error);
    }
  }

  private async transaction(work: (connection: PoolConnection) => Promise<void>): Promise<void> {
    let connection: PoolConnection;
    try {
      connection = await this.pool.getConnection();
    } catch (error) {
      throw this.queryError('BEGIN', error);
    }

    try {
      await connection.beginTransaction();
      await work(connection);
      await connection.commit();
    } catch (error) {
      await connection.rollback().catch((rollbackError: unknown) => {
        this.logger.warn('Rollback failed', { error: errorMessage(rollbackError) });
      });
      throw this.queryError('transaction', error);
    } finally {
      connection.release();
    }
  }

  private queryError(sql: string, error: unknown): LikedropError {
    return new LikedropError(
      ErrorCode.MEDIA_LIBRARY,
      `Failed to query media library database: ${errorMessage(error)}`,
      false,
      'Check the MEDIA_LIBRARY_DB_* settings and that the database is reachable',
      { sql }
    );
  }
}
