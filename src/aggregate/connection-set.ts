/**
 * Deduplicated, first-seen-ordered set of classified connections.
 *
 * Identity is (host, port, scheme) with absent parts treated as unknown:
 * `http://h:443` and `h:443` are the same endpoint. When two references
 * collide, the slot keeps whichever is more fully qualified, preferring
 * the one seen first.
 */

import type { ClassifiedConnection } from '../types/index.js';
import { defaultPort } from './ports.js';

export class ConnectionSet {
  private readonly slots: ClassifiedConnection[] = [];
  private readonly byHost = new Map<string, number[]>();

  add(conn: ClassifiedConnection): void {
    const indices = this.byHost.get(conn.host) ?? [];
    for (const i of indices) {
      const existing = this.slots[i];
      if (!collides(existing, conn)) continue;
      if (qualification(conn) > qualification(existing)) this.slots[i] = conn;
      return;
    }
    indices.push(this.slots.length);
    this.byHost.set(conn.host, indices);
    this.slots.push(conn);
  }

  get size(): number {
    return this.slots.length;
  }

  values(): ClassifiedConnection[] {
    return [...this.slots];
  }
}

function effectivePort(c: ClassifiedConnection): number | undefined {
  return c.port ?? defaultPort(c.scheme);
}

function collides(a: ClassifiedConnection, b: ClassifiedConnection): boolean {
  if (a.host !== b.host) return false;
  if (a.scheme && b.scheme && a.scheme !== b.scheme) return false;
  const pa = effectivePort(a);
  const pb = effectivePort(b);
  return pa === undefined || pb === undefined || pa === pb;
}

function qualification(c: ClassifiedConnection): number {
  return (c.scheme ? 1 : 0) + (c.port !== undefined ? 1 : 0);
}
