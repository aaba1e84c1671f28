import { Inject, Injectable } from '@nestjs/common';
import { DataSource, DeepPartial, EntityTarget, ObjectLiteral } from 'typeorm';

import { DuplicateEntityError, isUniqueViolation } from '../database/duplicate-entity.error.js';
import { CatalogRepo } from './catalog.repo.js';
import { DomainEntity } from './domain/domain.entity.js';
import { InterfaceEntity } from './interface/interface.entity.js';
import { PodEntity } from './pod/pod.entity.js';
import { UserDomainAssignmentEntity } from './user/user-domain-assignment.entity.js';
import { UserEntity, UserRole } from './user/user.entity.js';
import { WeekEntity } from './week/week.entity.js';

@Injectable()
export class CatalogTypeormRepo extends CatalogRepo {
  constructor(@Inject(DataSource) private readonly ds: DataSource) {
    super();
  }

  /** Insert in its own transaction so a unique violation rolls back cleanly. */
  private async insertOne<T extends ObjectLiteral>(
    target: EntityTarget<T>,
    label: string,
    naturalKey: string,
    values: DeepPartial<T>,
  ): Promise<T> {
    try {
      return await this.ds.transaction((manager) => {
        const repo = manager.getRepository(target);
        return repo.save(repo.create(values));
      });
    } catch (error: unknown) {
      if (isUniqueViolation(error)) throw new DuplicateEntityError(label, naturalKey);
      throw error;
    }
  }

  // ---------- users ----------
  findUserByLogin(githubUsername: string): Promise<UserEntity | null> {
    return this.ds.getRepository(UserEntity).findOne({ where: { githubUsername } });
  }

  insertUser(row: { githubUsername: string; role: UserRole | null }): Promise<UserEntity> {
    return this.insertOne<UserEntity>(UserEntity, 'user', row.githubUsername, row);
  }

  listUsers(): Promise<UserEntity[]> {
    return this.ds.getRepository(UserEntity).find({ order: { id: 'ASC' } });
  }

  // ---------- domains ----------
  findDomainByName(domainName: string): Promise<DomainEntity | null> {
    return this.ds.getRepository(DomainEntity).findOne({ where: { domainName } });
  }

  insertDomain(row: { domainName: string }): Promise<DomainEntity> {
    return this.insertOne<DomainEntity>(DomainEntity, 'domain', row.domainName, row);
  }

  listDomains(): Promise<DomainEntity[]> {
    return this.ds.getRepository(DomainEntity).find({ order: { id: 'ASC' } });
  }

  // ---------- interfaces ----------
  findInterface(domainId: number, interfaceNum: number): Promise<InterfaceEntity | null> {
    return this.ds.getRepository(InterfaceEntity).findOne({ where: { domainId, interfaceNum } });
  }

  insertInterface(row: { domainId: number; interfaceNum: number }): Promise<InterfaceEntity> {
    return this.insertOne<InterfaceEntity>(InterfaceEntity, 'interface', `${row.domainId}/${row.interfaceNum}`, row);
  }

  listInterfaces(): Promise<InterfaceEntity[]> {
    return this.ds.getRepository(InterfaceEntity).find({ order: { id: 'ASC' } });
  }

  // ---------- weeks & pods ----------
  findWeekByName(weekName: string): Promise<WeekEntity | null> {
    return this.ds.getRepository(WeekEntity).findOne({ where: { weekName } });
  }

  insertWeek(row: { weekName: string; weekNum: number; displayName: string }): Promise<WeekEntity> {
    return this.insertOne<WeekEntity>(WeekEntity, 'week', row.weekName, row);
  }

  findPodByName(name: string): Promise<PodEntity | null> {
    return this.ds.getRepository(PodEntity).findOne({ where: { name } });
  }

  insertPod(row: { name: string; displayName: string }): Promise<PodEntity> {
    return this.insertOne<PodEntity>(PodEntity, 'pod', row.name, row);
  }

  // ---------- assignments ----------
  findAssignment(userId: number, domainId: number): Promise<UserDomainAssignmentEntity | null> {
    return this.ds.getRepository(UserDomainAssignmentEntity).findOne({ where: { userId, domainId } });
  }

  insertAssignment(row: { userId: number; domainId: number }): Promise<UserDomainAssignmentEntity> {
    return this.insertOne<UserDomainAssignmentEntity>(UserDomainAssignmentEntity, 'assignment', `${row.userId}/${row.domainId}`, row);
  }
}
