/** Output size relative to the source, measured per encoder. */
export const CODEC_COMPRESSION_RATIOS: Readonly<Record<string, number>> = {
  h264_nvenc: 0.65,
  h265_nvenc: 0.45,
  av1_nvenc: 0.35,
  libx264: 0.7,
  libx265: 0.5,
  'libaom-av1': 0.4,
  'libvpx-vp9': 0.55,
  h264: 0.68,
  h265: 0.48,
  hevc: 0.48,
  av1: 0.38,
  vp9: 0.58
};

/** Container overhead on top of the encoded streams. */
export const FORMAT_MULTIPLIERS: Readonly<Record<string, number>> = {
  mp4: 1.02,
  mkv: 1.05,
  avi: 1.08,
  mov: 1.03,
  webm: 1.01,
  flv: 1.06,
  wmv: 1.07,
  m4v: 1.02
};

export const DEFAULT_COMPRESSION_RATIO = 0.8;
export const DEFAULT_FORMAT_MULTIPLIER = 1.0;

/** Temporary files written during a conversion take one tenth of the source size. */
export const TEMP_OVERHEAD_DIVISOR = 10;

export const SUPPORTED_OUTPUT_FORMATS = Object.keys(FORMAT_MULTIPLIERS);
export const SUPPORTED_VIDEO_CODECS = Object.keys(CODEC_COMPRESSION_RATIOS);
