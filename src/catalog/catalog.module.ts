import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { GithubModule } from '../github/github.module.js';
import { CatalogRepo } from './catalog.repo.js';
import { CatalogTypeormRepo } from './catalog.typeorm.repo.js';
import { DomainCatalogService } from './domain-catalog.service.js';
import { DomainEntity } from './domain/domain.entity.js';
import { EntityResolverService } from './entity-resolver.service.js';
import { InterfaceEntity } from './interface/interface.entity.js';
import { PodEntity } from './pod/pod.entity.js';
import { UserDomainAssignmentEntity } from './user/user-domain-assignment.entity.js';
import { UserEntity } from './user/user.entity.js';
import { WeekEntity } from './week/week.entity.js';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      UserEntity,
      DomainEntity,
      InterfaceEntity,
      WeekEntity,
      PodEntity,
      UserDomainAssignmentEntity,
    ]),
    GithubModule,
  ],
  providers: [
    { provide: CatalogRepo, useClass: CatalogTypeormRepo },
    EntityResolverService,
    DomainCatalogService,
  ],
  exports: [CatalogRepo, EntityResolverService, DomainCatalogService],
})
export class CatalogModule {}
