export interface SceneTools {
  ffmpegPath: string;
  colmapPath: string;
  /** Passed to the sift extraction and matching steps as 0/1. */
  useGpu: boolean;
  /** ffmpeg `-q:v` value for extracted frames. */
  frameQuality: number;
}

export const DEFAULT_SCENE_TOOLS: SceneTools = {
  ffmpegPath: 'ffmpeg',
  colmapPath: 'colmap',
  useGpu: true,
  frameQuality: 2,
};

export const MIN_FRAMES = 3;
