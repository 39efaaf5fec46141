import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../../database/database.service';
import { HealthProbe } from './health-probe.interface';

interface ProbeRow {
  ok: number;
}

@Injectable()
export class DatabaseProbe implements HealthProbe {
  readonly name = 'database';
  readonly route = 'db';

  constructor(private readonly database: DatabaseService) {}

  /**
   * Passes only for exactly one row carrying the selected constant.
   * The pool's `query_timeout` bounds the round trip.
   */
  async check(): Promise<boolean> {
    const result = await this.database.query<ProbeRow>('SELECT 1 AS ok');

    return result.rowCount === 1 && result.rows.length === 1 && Number(result.rows[0].ok) === 1;
  }
}
