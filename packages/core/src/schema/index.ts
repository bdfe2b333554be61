export { taskRecordSchema, taskFileSchema, toRecord, serializeTasks, parseTaskFile } from './task-file.js';
export type { TaskRecord } from './task-file.js';
