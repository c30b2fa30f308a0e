export const events = {
  // Client >>>> Server
  LESSON_JOIN: 'lesson:join', // join a lesson channel
  LESSON_LEAVE: 'lesson:leave', // leave the current lesson channel
  LESSON_COMMAND: 'lesson:command', // { type, ...payload } command envelope

  // Server >>>> Client
  LESSON_EVENT: 'lesson:event', // { type, ...payload, timestamp } event envelope

  // Server internal (EventEmitter2)
  SESSION_CREATED: 'lesson.session.created',
  SESSION_CLOSED: 'lesson.session.closed',
} as const;
