import { randomUUID } from 'node:crypto';
import type { TodoItem, TodoStatus } from '@loomwork/shared';

/**
 * Ordered todo list of one project session. Any status may move to any
 * other; items are only removed by `clear()`.
 */
export class TodoList {
  private readonly items = new Map<string, TodoItem>();

  constructor(private readonly newId: () => string = randomUUID) {}

  get size(): number {
    return this.items.size;
  }

  create(title: string, description = ''): TodoItem {
    const item: TodoItem = { id: this.newId(), title, description, status: 'pending' };
    this.items.set(item.id, item);
    return { ...item };
  }

  /** Undefined when no todo has this id. */
  update(id: string, status: TodoStatus): TodoItem | undefined {
    const item = this.items.get(id);
    if (!item) return undefined;
    item.status = status;
    return { ...item };
  }

  get(id: string): TodoItem | undefined {
    const item = this.items.get(id);
    return item ? { ...item } : undefined;
  }

  list(): TodoItem[] {
    return [...this.items.values()].map((item) => ({ ...item }));
  }

  clear(): void {
    this.items.clear();
  }
}
