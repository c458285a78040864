/** One admitted, in-flight unit of work, as stored in the WIP document */
export interface WipSession {
  key: string;
  projectId: string;
  priority: string;
  startedAt: Date;
}

/** Attributes attached to an external (tmux) session when it is created */
export interface SessionRecord {
  name: string;
  workspace: string;
  pollConfig: string;
  itemKey: string;
  branch: string;
  sourceUrl: string;
  sourceType: string;
  /** Session creation time, epoch seconds (0 when unknown) */
  created: number;
}
