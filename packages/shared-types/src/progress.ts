/**
 * Learning progress types synced between devices
 */

export interface ProgressMark {
  lessonId: string;
  courseId: string;
  userId?: string;
  /** 0-100 */
  percent: number;
  /** Playback position in seconds for video/audio lessons */
  positionSeconds?: number;
  /** Page for PDF lessons */
  page?: number;
  completed: boolean;
  deviceId?: string;
}

export interface LessonRating {
  lessonId: string;
  stars: 1 | 2 | 3 | 4 | 5;
  comment?: string;
}

/**
 * Study session tracking
 */
export interface StudySession {
  id: string;
  lessonId: string;
  startedAt: number;
  endedAt?: number;
  startPercent: number;
  endPercent?: number;
  duration?: number; // in seconds
}
