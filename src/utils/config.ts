import path from 'path';
import { fileURLToPath } from 'url';
import { Config } from '../types/index.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const projectRoot = path.resolve(__dirname, '../..');

// Colors are 256-color ANSI codes
export const config: Config = {
  coursesFolder: path.join(projectRoot, 'courses'),
  courseTypes: [
    { name: 'lab', color: 118, hasHomework: true },
    { name: 'lecture', color: 39, hasHomework: false },
  ],
  paths: {
    dataDir: path.join(projectRoot, 'data'),
    settings: process.env.SCHOOL_CONFIG ?? path.join(projectRoot, 'school.yaml'),
    log: path.join(projectRoot, 'data', 'school.log'),
  },
};
