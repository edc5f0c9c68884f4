import { Module } from '@nestjs/common';
import { DeploymentLockService } from './deployment-lock.service';

/** Cross-process deploy serialization (one run per namespace/workload). */
@Module({
  providers: [DeploymentLockService],
  exports: [DeploymentLockService],
})
export class LocksModule {}
