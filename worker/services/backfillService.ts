import type { CommentRecord, WorkItemRecord } from './types';

const countBy = <T>(items: T[], key: (item: T) => string | null) => {
  const counts = new Map<string, number>();
  for (const item of items) {
    const id = key(item);
    if (id !== null) counts.set(id, (counts.get(id) ?? 0) + 1);
  }
  return counts;
};

/**
 * Returns tasks followed by subtasks with `numSubtasks` and `numComments`
 * taken from the finished child collections. Inputs are left untouched.
 */
export const backfillCounts = (
  tasks: WorkItemRecord[],
  subtasks: WorkItemRecord[],
  comments: CommentRecord[]
): WorkItemRecord[] => {
  const subtaskCounts = countBy(subtasks, (subtask) => subtask.parentTaskId);
  const commentCounts = countBy(comments, (comment) => comment.taskId);
  return [...tasks, ...subtasks].map((item) => ({
    ...item,
    numSubtasks: subtaskCounts.get(item.id) ?? 0,
    numComments: commentCounts.get(item.id) ?? 0,
  }));
};
