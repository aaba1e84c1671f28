import type { DomainEntity } from './domain/domain.entity.js';
import type { InterfaceEntity } from './interface/interface.entity.js';
import type { PodEntity } from './pod/pod.entity.js';
import type { UserDomainAssignmentEntity } from './user/user-domain-assignment.entity.js';
import type { UserEntity, UserRole } from './user/user.entity.js';
import type { WeekEntity } from './week/week.entity.js';

/**
 * Persistence for the normalized catalog (users, domains, interfaces, weeks,
 * pods). Every `insert*` runs in its own transaction and throws
 * `DuplicateEntityError` when a unique constraint rejects the row.
 */
export abstract class CatalogRepo {
  abstract findUserByLogin(githubUsername: string): Promise<UserEntity | null>;
  abstract insertUser(row: { githubUsername: string; role: UserRole | null }): Promise<UserEntity>;
  abstract listUsers(): Promise<UserEntity[]>;

  abstract findDomainByName(domainName: string): Promise<DomainEntity | null>;
  abstract insertDomain(row: { domainName: string }): Promise<DomainEntity>;
  abstract listDomains(): Promise<DomainEntity[]>;

  abstract findInterface(domainId: number, interfaceNum: number): Promise<InterfaceEntity | null>;
  abstract insertInterface(row: { domainId: number; interfaceNum: number }): Promise<InterfaceEntity>;
  abstract listInterfaces(): Promise<InterfaceEntity[]>;

  abstract findWeekByName(weekName: string): Promise<WeekEntity | null>;
  abstract insertWeek(row: { weekName: string; weekNum: number; displayName: string }): Promise<WeekEntity>;

  abstract findPodByName(name: string): Promise<PodEntity | null>;
  abstract insertPod(row: { name: string; displayName: string }): Promise<PodEntity>;

  abstract findAssignment(userId: number, domainId: number): Promise<UserDomainAssignmentEntity | null>;
  abstract insertAssignment(row: { userId: number; domainId: number }): Promise<UserDomainAssignmentEntity>;
}
