import { Injectable, Logger } from '@nestjs/common';

import { DuplicateEntityError } from '../database/duplicate-entity.error.js';
import { weekDisplayName, weekName, podDisplayName } from '../parsing/path-parser.js';
import { normalizeName } from '../settings/settings.js';
import { CatalogRepo } from './catalog.repo.js';
import type { DomainEntity } from './domain/domain.entity.js';
import type { InterfaceEntity } from './interface/interface.entity.js';
import type { PodEntity } from './pod/pod.entity.js';
import type { UserDomainAssignmentEntity } from './user/user-domain-assignment.entity.js';
import type { UserEntity, UserRole } from './user/user.entity.js';
import type { WeekEntity } from './week/week.entity.js';

export type EntityKind = 'user' | 'domain' | 'interface' | 'week' | 'pod' | 'assignment';

export interface Resolved<T> {
  entity: T;
  created: boolean;
}

/** A required catalog row could neither be found nor created. */
export class EntityResolutionError extends Error {
  constructor(
    readonly kind: EntityKind,
    readonly naturalKey: string,
    readonly reason: unknown,
  ) {
    const detail = reason instanceof Error ? reason.message : String(reason);
    super(`Could not resolve ${kind} "${naturalKey}": ${detail}`);
    this.name = 'EntityResolutionError';
  }
}

const ASSIGNABLE_ROLES: ReadonlySet<UserRole> = new Set<UserRole>(['trainer', 'pod_lead']);

@Injectable()
export class EntityResolverService {
  private readonly logger = new Logger(EntityResolverService.name);

  constructor(private readonly catalog: CatalogRepo) {}

  /**
   * Look up, insert when absent, and on a unique violation from a concurrent
   * writer re-read the row that writer committed.
   */
  private async getOrCreate<T>(
    kind: EntityKind,
    naturalKey: string,
    find: () => Promise<T | null>,
    insert: () => Promise<T>,
  ): Promise<Resolved<T>> {
    try {
      const existing = await find();
      if (existing) return { entity: existing, created: false };

      try {
        const entity = await insert();
        this.logger.debug(`Created ${kind} "${naturalKey}"`);
        return { entity, created: true };
      } catch (error: unknown) {
        if (!(error instanceof DuplicateEntityError)) throw error;

        this.logger.debug(`${kind} "${naturalKey}" was created concurrently, re-reading`);
        const winner = await find();
        if (winner) return { entity: winner, created: false };
        throw new EntityResolutionError(kind, naturalKey, 'row missing after unique violation');
      }
    } catch (error: unknown) {
      if (error instanceof EntityResolutionError) throw error;
      throw new EntityResolutionError(kind, naturalKey, error);
    }
  }

  private requireKey(kind: EntityKind, key: string): string {
    if (key.length === 0) throw new EntityResolutionError(kind, key, 'empty natural key');
    return key;
  }

  async resolveUser(login: string, role: UserRole | null = null): Promise<Resolved<UserEntity>> {
    const githubUsername = this.requireKey('user', login.trim());
    return this.getOrCreate(
      'user',
      githubUsername,
      () => this.catalog.findUserByLogin(githubUsername),
      () => this.catalog.insertUser({ githubUsername, role }),
    );
  }

  async resolveDomain(name: string): Promise<Resolved<DomainEntity>> {
    const domainName = this.requireKey('domain', normalizeName(name));
    return this.getOrCreate(
      'domain',
      domainName,
      () => this.catalog.findDomainByName(domainName),
      () => this.catalog.insertDomain({ domainName }),
    );
  }

  async resolveInterface(domainId: number, interfaceNum: number): Promise<Resolved<InterfaceEntity>> {
    return this.getOrCreate(
      'interface',
      `${domainId}/${interfaceNum}`,
      () => this.catalog.findInterface(domainId, interfaceNum),
      () => this.catalog.insertInterface({ domainId, interfaceNum }),
    );
  }

  async resolveWeek(weekNum: number): Promise<Resolved<WeekEntity>> {
    const name = weekName(weekNum);
    return this.getOrCreate(
      'week',
      name,
      () => this.catalog.findWeekByName(name),
      () => this.catalog.insertWeek({ weekName: name, weekNum, displayName: weekDisplayName(weekNum) }),
    );
  }

  async resolvePod(podName: string): Promise<Resolved<PodEntity>> {
    const name = this.requireKey('pod', normalizeName(podName));
    return this.getOrCreate(
      'pod',
      name,
      () => this.catalog.findPodByName(name),
      () => this.catalog.insertPod({ name, displayName: podDisplayName(name) }),
    );
  }

  /**
   * Links trainers and pod leads to a domain they touched. Returns null for
   * other roles.
   */
  async ensureAssignment(
    user: UserEntity,
    domainId: number,
  ): Promise<Resolved<UserDomainAssignmentEntity> | null> {
    if (user.role === null || !ASSIGNABLE_ROLES.has(user.role)) return null;
    return this.getOrCreate(
      'assignment',
      `${user.githubUsername}/${domainId}`,
      () => this.catalog.findAssignment(user.id, domainId),
      () => this.catalog.insertAssignment({ userId: user.id, domainId }),
    );
  }
}
