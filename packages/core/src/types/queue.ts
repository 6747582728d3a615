export type WorkItemPriority = 'high' | 'normal' | 'low';

export type WorkItemStatus = 'pending' | 'processing' | 'completed' | 'failed';

export const WORK_ITEM_STATUSES = [
  'pending',
  'processing',
  'completed',
  'failed',
] as const satisfies readonly WorkItemStatus[];

/** Numeric rank stored in the database; higher is dequeued first. */
export const PRIORITY_RANK: Record<WorkItemPriority, number> = {
  high: 2,
  normal: 1,
  low: 0,
};

export function priorityFromRank(rank: number): WorkItemPriority {
  if (rank >= PRIORITY_RANK.high) return 'high';
  if (rank <= PRIORITY_RANK.low) return 'low';
  return 'normal';
}

export interface WorkItem {
  id: string;
  syncJobId: string;
  providerId: string;
  remoteFileId: string;
  path: string;
  size: number | null;
  mimeType: string | null;
  providerModifiedAt: string | null;
  priority: WorkItemPriority;
  status: WorkItemStatus;
  retryCount: number;
  lastError: string | null;
  /** Earliest time a pending item may be dequeued again (null = immediately) */
  retryAt: string | null;
  processingStartedAt: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface NewWorkItem {
  syncJobId: string;
  providerId: string;
  remoteFileId: string;
  path: string;
  size: number | null;
  mimeType: string | null;
  providerModifiedAt: string | null;
  priority?: WorkItemPriority;
}

export type WorkItemUpdate = Partial<
  Pick<WorkItem, 'status' | 'retryCount' | 'lastError' | 'retryAt' | 'processingStartedAt'>
>;

/** Fresher listing data for a file that is still waiting in the queue */
export type WorkItemRefresh = Pick<WorkItem, 'path' | 'size' | 'mimeType' | 'providerModifiedAt' | 'priority'>;

export interface QueueScope {
  providerId?: string;
  syncJobId?: string;
}

export type WorkItemCounts = Record<WorkItemStatus, number>;

export interface QueueStats extends WorkItemCounts {
  /** Admission slots free right now */
  availableSlots: number;
  maxConcurrent: number;
}
