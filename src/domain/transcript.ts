/** Content summary used when no transcript of the audio is available. */
export const PLACEHOLDER_TRANSCRIPT =
  "Audio content extracted from video. Video appears to contain valuable content suitable for clipping based on duration and file analysis.";
