import { Injectable } from '@nestjs/common';

import { DuplicateEntityError } from '../database/duplicate-entity.error.js';
import { CatalogRepo } from './catalog.repo.js';
import { DomainEntity } from './domain/domain.entity.js';
import { InterfaceEntity } from './interface/interface.entity.js';
import { PodEntity } from './pod/pod.entity.js';
import { UserDomainAssignmentEntity } from './user/user-domain-assignment.entity.js';
import { UserEntity, UserRole } from './user/user.entity.js';
import { WeekEntity } from './week/week.entity.js';

// In-process stand-in used by tests; enforces the same unique keys as the schema.
@Injectable()
export class CatalogMemoryRepo extends CatalogRepo {
  private nextId = 1;

  readonly users: UserEntity[] = [];
  readonly domains: DomainEntity[] = [];
  readonly interfaces: InterfaceEntity[] = [];
  readonly weeks: WeekEntity[] = [];
  readonly pods: PodEntity[] = [];
  readonly assignments: UserDomainAssignmentEntity[] = [];

  private unique<T>(rows: T[], label: string, key: string, clash: (row: T) => boolean): void {
    if (rows.some(clash)) throw new DuplicateEntityError(label, key);
  }

  async findUserByLogin(githubUsername: string): Promise<UserEntity | null> {
    return this.users.find((u) => u.githubUsername === githubUsername) ?? null;
  }

  async insertUser(row: { githubUsername: string; role: UserRole | null }): Promise<UserEntity> {
    this.unique(this.users, 'user', row.githubUsername, (u) => u.githubUsername === row.githubUsername);
    const user = Object.assign(new UserEntity(), { ...row, id: this.nextId++, createdAt: new Date() });
    this.users.push(user);
    return user;
  }

  async listUsers(): Promise<UserEntity[]> {
    return [...this.users];
  }

  async findDomainByName(domainName: string): Promise<DomainEntity | null> {
    return this.domains.find((d) => d.domainName === domainName) ?? null;
  }

  async insertDomain(row: { domainName: string }): Promise<DomainEntity> {
    this.unique(this.domains, 'domain', row.domainName, (d) => d.domainName === row.domainName);
    const domain = Object.assign(new DomainEntity(), {
      id: this.nextId++,
      domainName: row.domainName,
      totalTasks: 0,
      mergedTasks: 0,
      totalRework: 0,
      statusCounts: {},
      complexityCounts: {},
      detailedMetrics: null,
      createdAt: new Date(),
    });
    this.domains.push(domain);
    return domain;
  }

  async listDomains(): Promise<DomainEntity[]> {
    return [...this.domains];
  }

  async findInterface(domainId: number, interfaceNum: number): Promise<InterfaceEntity | null> {
    return this.interfaces.find((i) => i.domainId === domainId && i.interfaceNum === interfaceNum) ?? null;
  }

  async insertInterface(row: { domainId: number; interfaceNum: number }): Promise<InterfaceEntity> {
    this.unique(
      this.interfaces,
      'interface',
      `${row.domainId}/${row.interfaceNum}`,
      (i) => i.domainId === row.domainId && i.interfaceNum === row.interfaceNum,
    );
    const iface = Object.assign(new InterfaceEntity(), {
      id: this.nextId++,
      domainId: row.domainId,
      interfaceNum: row.interfaceNum,
      totalTasks: 0,
      mergedTasks: 0,
      totalRework: 0,
      statusCounts: {},
      complexityCounts: {},
      detailedMetrics: null,
      weeklyStats: [],
      complexityBreakdown: null,
      createdAt: new Date(),
    });
    this.interfaces.push(iface);
    return iface;
  }

  async listInterfaces(): Promise<InterfaceEntity[]> {
    return [...this.interfaces];
  }

  async findWeekByName(weekName: string): Promise<WeekEntity | null> {
    return this.weeks.find((w) => w.weekName === weekName) ?? null;
  }

  async insertWeek(row: { weekName: string; weekNum: number; displayName: string }): Promise<WeekEntity> {
    this.unique(this.weeks, 'week', row.weekName, (w) => w.weekName === row.weekName);
    const week = Object.assign(new WeekEntity(), { ...row, id: this.nextId++ });
    this.weeks.push(week);
    return week;
  }

  async findPodByName(name: string): Promise<PodEntity | null> {
    return this.pods.find((p) => p.name === name) ?? null;
  }

  async insertPod(row: { name: string; displayName: string }): Promise<PodEntity> {
    this.unique(this.pods, 'pod', row.name, (p) => p.name === row.name);
    const pod = Object.assign(new PodEntity(), { ...row, id: this.nextId++ });
    this.pods.push(pod);
    return pod;
  }

  async findAssignment(userId: number, domainId: number): Promise<UserDomainAssignmentEntity | null> {
    return this.assignments.find((a) => a.userId === userId && a.domainId === domainId) ?? null;
  }

  async insertAssignment(row: { userId: number; domainId: number }): Promise<UserDomainAssignmentEntity> {
    this.unique(
      this.assignments,
      'assignment',
      `${row.userId}/${row.domainId}`,
      (a) => a.userId === row.userId && a.domainId === row.domainId,
    );
    const assignment = Object.assign(new UserDomainAssignmentEntity(), {
      ...row,
      id: this.nextId++,
      createdAt: new Date(),
    });
    this.assignments.push(assignment);
    return assignment;
  }
}
