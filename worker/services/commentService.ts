import type { GenerationContext } from './context';
import type { CommentRecord, WorkItemRecord } from './types';
import { addHours, generateId } from './utils';

const COMMENT_TEXTS = [
  'Working on this now',
  'Updated the implementation',
  'Ready for review',
  'Looks good to me',
  'Need more info on this',
  'Blocked by another task',
  'Can we prioritize this?',
];
const LIKED_RATE = 0.3;
const MAX_COMMENT_LIKES = 3;

/** Comment authors are limited to the item's assignee and creator. */
export const generateComments = (ctx: GenerationContext, items: WorkItemRecord[]): CommentRecord[] => {
  const { config, rng, horizon } = ctx;
  const comments: CommentRecord[] = [];

  for (const item of items) {
    if (rng.real(0, 1) >= config.commentRate) continue;
    const count = rng.integer(...config.commentsPerTask);
    const authors = [item.assigneeId, item.createdBy].filter((id): id is string => id !== null);
    if (authors.length === 0) continue;

    for (let index = 0; index < count; index += 1) {
      comments.push({
        id: generateId(rng),
        taskId: item.id,
        userId: rng.pick(authors),
        commentType: 'comment',
        text: rng.pick(COMMENT_TEXTS),
        createdAt: Math.min(addHours(item.createdAt, rng.integer(1, 168)), horizon.end),
        isPinned: false,
        numLikes: rng.real(0, 1) < LIKED_RATE ? rng.integer(0, MAX_COMMENT_LIKES) : 0,
      });
    }
  }
  return comments;
};
