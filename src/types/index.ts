// Core data types used throughout the application

export interface CourseType {
  name: string;
  color: number;
  hasHomework: boolean;
}

export interface Config {
  coursesFolder: string;
  courseTypes: CourseType[];
  paths: {
    dataDir: string;
    settings: string;
    log: string;
  };
}
