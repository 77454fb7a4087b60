import fs from 'node:fs/promises';
import path from 'node:path';
import type { SnapshotRef, SnapshotStore } from '../types.js';

export const DEFAULT_SNAPSHOT_DIRECTORY = 'events';
const CONTENT_TYPE = 'image/png';

function pad(value: number) {
  return String(value).padStart(2, '0');
}

export function snapshotFileName(at: Date): string {
  const date = `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}`;
  const time = `${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`;
  return `event_${date}_${time}.png`;
}

export class FileSnapshotStore implements SnapshotStore {
  constructor(private readonly directory: string = DEFAULT_SNAPSHOT_DIRECTORY) {}

  async persist(frame: Buffer, at: Date): Promise<SnapshotRef> {
    await fs.mkdir(this.directory, { recursive: true });
    const fileName = snapshotFileName(at);
    const filePath = path.join(this.directory, fileName);
    await fs.writeFile(filePath, frame);
    return { path: filePath, fileName, contentType: CONTENT_TYPE, data: frame };
  }
}

export default FileSnapshotStore;
