import { describe, it, expect } from 'vitest';
import { parseTaskFile, serializeTasks } from '../../src/schema/task-file.js';
import { Priority } from '../../src/types/priority.js';
import type { Task } from '../../src/types/task.js';
import { CorruptStoreError } from '../../src/errors.js';

describe('serializeTasks', () => {
  it('writes keys in a fixed order', () => {
    const task: Task = { priority: Priority.Low, completed: true, title: 'Ordered' };
    expect(serializeTasks([task])).toBe(
      '[\n  {\n    "title": "Ordered",\n    "completed": true,\n    "priority": "Low"\n  }\n]\n',
    );
  });

  it('writes an empty array for no tasks', () => {
    expect(serializeTasks([])).toBe('[]\n');
  });
});

describe('parseTaskFile', () => {
  it('round-trips serialized tasks', () => {
    const tasks: Task[] = [
      { title: 'One', completed: false, priority: Priority.High },
      { title: 'Two, "quoted"', completed: true, priority: null },
    ];
    expect(parseTaskFile(serializeTasks(tasks), 'todo.json')).toEqual(tasks);
  });

  it('drops unknown keys', () => {
    expect(parseTaskFile('[{"title":"A","completed":false,"id":7}]', 'todo.json')).toEqual([
      { title: 'A', completed: false, priority: null },
    ]);
  });

  it('names the file in the error', () => {
    expect(() => parseTaskFile('{"not":"an array"}', '/data/todo.json'))
      .toThrow('Store file /data/todo.json is corrupt: expected an array of tasks');
  });

  it.each([
    '[{"completed":false}]',
    '[{"title":"","completed":false}]',
    '[{"title":"A"}]',
    '[null]',
    '"text"',
  ])('rejects %s', (raw) => {
    expect(() => parseTaskFile(raw, 'todo.json')).toThrow(CorruptStoreError);
  });
});
