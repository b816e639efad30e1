export interface MediaItem {
  id: number;
  title: string;
  category: string;
  file_path: string;
  url: string;
  uploaded_at: Date;
}

export interface CreateMediaItem {
  title: string;
  category: string;
  file_path: string;
}

export interface UpdateMediaItem {
  title?: string;
  category?: string;
}

export interface MediaFilter {
  category?: string;
  q?: string;
}

export interface UploadedFile {
  originalName: string;
  buffer: Buffer;
  size: number;
}
