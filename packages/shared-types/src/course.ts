/**
 * Course-related types shared between the sync engine and the client app
 */

export interface Course {
  id: string;
  title: string;
  instructor?: string;
  description?: string;
  language?: string;
  coverUrl?: string;
  lessonIds: string[];
  publishedAt?: string;
  updatedAt: number;
}

export type AssetKind = 'video' | 'pdf' | 'audio';

/**
 * Quality ladder for downloadable assets. Videos use the resolution names,
 * documents always come as 'original'.
 */
export type AssetQuality = 'original' | '1080p' | '720p' | '480p' | '360p';

export interface LessonAsset {
  kind: AssetKind;
  /** Size in bytes, when the catalog knows it */
  sizeBytes?: number;
  quality: AssetQuality;
}

export interface Lesson {
  id: string;
  courseId: string;
  title: string;
  position: number;
  durationSeconds?: number;
  assets: LessonAsset[];
  updatedAt: number;
}
