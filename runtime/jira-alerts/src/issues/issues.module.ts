/**
 * SPDX-License-Identifier: Apache-2.0
 * Copyright 2025 Provability-Fabric Contributors
 */

import { Module } from '@nestjs/common';
import { ReconcilerModule } from '../reconciler/reconciler.module';
import { IssuesController } from './issues.controller';

@Module({
  imports: [ReconcilerModule],
  controllers: [IssuesController],
})
export class IssuesModule {}
