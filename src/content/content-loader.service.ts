// dynasty_v1 JSON catalog load + in-memory cache

import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { join } from 'path';
import type {
  EnemyDefinition,
  ItemDefinition,
  OriginDefinition,
  SkillDefinition,
} from './content.types.js';
import type { Origin } from '../db/types/index.js';
import { AppConfigService } from '../common/config/app-config.service.js';
import { CatalogSchemas } from './content.schemas.js';

@Injectable()
export class ContentLoaderService implements OnModuleInit {
  private readonly logger = new Logger(ContentLoaderService.name);
  private items = new Map<string, ItemDefinition>();
  private skills = new Map<string, SkillDefinition>();
  private enemies = new Map<string, EnemyDefinition>();
  private origins = new Map<Origin, OriginDefinition>();

  constructor(private readonly config: AppConfigService) {}

  async onModuleInit() {
    await this.loadAll();
  }

  async loadAll(): Promise<void> {
    const dir = this.config.get().contentDir;
    const [itemsRaw, skillsRaw, enemiesRaw, originsRaw] = await Promise.all([
      readFile(join(dir, 'items.json'), 'utf-8'),
      readFile(join(dir, 'skills.json'), 'utf-8'),
      readFile(join(dir, 'enemies.json'), 'utf-8'),
      readFile(join(dir, 'origins.json'), 'utf-8'),
    ]);

    this.items.clear();
    this.skills.clear();
    this.enemies.clear();
    this.origins.clear();

    for (const it of CatalogSchemas.items.parse(JSON.parse(itemsRaw))) {
      this.items.set(it.itemId, it);
    }
    for (const sk of CatalogSchemas.skills.parse(JSON.parse(skillsRaw))) {
      this.skills.set(sk.skillId, sk);
    }
    for (const en of CatalogSchemas.enemies.parse(JSON.parse(enemiesRaw))) {
      this.enemies.set(en.enemyId, en);
    }
    for (const og of CatalogSchemas.origins.parse(JSON.parse(originsRaw))) {
      this.origins.set(og.origin, og);
    }

    this.assertReferences();
    this.logger.log(
      `Catalog loaded from ${dir}: ${this.items.size} items, ${this.skills.size} skills, ` +
        `${this.enemies.size} enemies, ${this.origins.size} origins`,
    );
  }

  /** Enemy loot and origin kits must point at known templates */
  private assertReferences(): void {
    const missing: string[] = [];
    for (const en of this.enemies.values()) {
      for (const itemId of en.loot) {
        if (!this.items.has(itemId)) missing.push(`enemy ${en.enemyId} loot ${itemId}`);
      }
    }
    for (const og of this.origins.values()) {
      for (const itemId of og.startingItems) {
        if (!this.items.has(itemId)) missing.push(`origin ${og.origin} item ${itemId}`);
      }
      for (const skillId of og.startingSkills) {
        if (!this.skills.has(skillId)) missing.push(`origin ${og.origin} skill ${skillId}`);
      }
    }
    if (missing.length > 0) {
      throw new Error(`Catalog references unknown ids: ${missing.join(', ')}`);
    }
  }

  getItem(id: string): ItemDefinition | undefined {
    return this.items.get(id);
  }

  getSkill(id: string): SkillDefinition | undefined {
    return this.skills.get(id);
  }

  getEnemy(id: string): EnemyDefinition | undefined {
    return this.enemies.get(id);
  }

  getOrigin(origin: Origin): OriginDefinition | undefined {
    return this.origins.get(origin);
  }
}
