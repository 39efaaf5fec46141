import { Module } from '@nestjs/common';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';
import { CacheProbe } from './probes/cache.probe';
import { DatabaseProbe } from './probes/database.probe';
import { HEALTH_PROBES, HealthProbe } from './probes/health-probe.interface';

@Module({
  controllers: [HealthController],
  providers: [
    DatabaseProbe,
    CacheProbe,
    {
      provide: HEALTH_PROBES,
      useFactory: (database: DatabaseProbe, cache: CacheProbe): HealthProbe[] => [
        database,
        cache,
      ],
      inject: [DatabaseProbe, CacheProbe],
    },
    HealthService,
  ],
  exports: [HealthService],
})
export class HealthModule {}
