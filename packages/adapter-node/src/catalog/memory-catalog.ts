/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import { componentEntrySchema, type ComponentEntry, type ComponentEntryInput } from '@composer-index/shared';
import type { ComponentCatalog } from '@composer-index/core';

/**
 * In-memory component catalog
 * Useful for development and testing, or for hosting a fixed set of archives
 */
export class MemoryComponentCatalog implements ComponentCatalog {
  private components = new Map<string, ComponentEntry>();

  constructor(entries: Iterable<ComponentEntryInput> = []) {
    for (const entry of entries) {
      this.add(entry);
    }
  }

  /**
   * Add or replace a component; group/name/version identify it
   */
  add(entry: ComponentEntryInput): ComponentEntry {
    const component = componentEntrySchema.parse(entry);
    this.components.set(`${component.group}/${component.name}@${component.version}`, component);
    return component;
  }

  remove(group: string, name: string, version: string): boolean {
    return this.components.delete(`${group}/${name}@${version}`);
  }

  async list(): Promise<ComponentEntry[]> {
    return [...this.components.values()];
  }
}
