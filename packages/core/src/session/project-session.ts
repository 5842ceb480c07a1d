import { logger } from '@loomwork/shared';
import { SerialQueue } from './serial-queue.js';
import { TodoList } from './todo-list.js';

const log = logger.child({ module: 'project-session' });

/**
 * Sole owner of one project's mutable session state. Work that touches
 * that state is submitted through `run()` and executes one task at a time,
 * so two agent turns on the same project never interleave mutations.
 */
export class ProjectSession {
  readonly todos: TodoList;
  private readonly queue = new SerialQueue();

  constructor(
    readonly projectId: string,
    newId?: () => string,
  ) {
    this.todos = new TodoList(newId);
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    return this.queue.run(task);
  }

  end(): void {
    log.info({ projectId: this.projectId, todos: this.todos.size }, 'session ended');
    this.todos.clear();
  }
}

export interface SessionRegistryOptions {
  /** Todo id generator, injectable for tests */
  newId?: () => string;
}

/** Hands out exactly one ProjectSession per project id. */
export class SessionRegistry {
  private readonly sessions = new Map<string, ProjectSession>();

  constructor(private readonly opts: SessionRegistryOptions = {}) {}

  forProject(projectId: string): ProjectSession {
    let session = this.sessions.get(projectId);
    if (!session) {
      session = new ProjectSession(projectId, this.opts.newId);
      this.sessions.set(projectId, session);
      log.debug({ projectId }, 'session started');
    }
    return session;
  }

  /** Clear the project's todos and forget its session. */
  endSession(projectId: string): void {
    const session = this.sessions.get(projectId);
    if (!session) return;
    session.end();
    this.sessions.delete(projectId);
  }

  activeProjects(): string[] {
    return [...this.sessions.keys()];
  }
}
