/**
 * Centralized media, language and model configuration
 * This is the single source of truth for what the pipeline accepts
 */

export const SUPPORTED_AUDIO = [".mp3", ".wav", ".m4a", ".ogg", ".flac", ".aac"] as const;
export const SUPPORTED_VIDEO = [".mp4", ".mov", ".avi", ".mkv", ".webm", ".flv", ".wmv"] as const;
export const SUPPORTED_FORMATS = [...SUPPORTED_AUDIO, ...SUPPORTED_VIDEO] as const;

// Sample rate and channel layout whisper expects
export const TARGET_SAMPLE_RATE = 16000;
export const TARGET_CHANNELS = 1;

export const LANGUAGE_CODES = ["nl", "en", "fr", "de", "es", "it", "pt", "ja", "zh", "ko"] as const;

export type LanguageCode = (typeof LANGUAGE_CODES)[number];

export const LANGUAGES: Record<LanguageCode, string> = {
  nl: "Nederlands",
  en: "English",
  fr: "Francais",
  de: "Deutsch",
  es: "Espanol",
  it: "Italiano",
  pt: "Portugues",
  ja: "Japanese",
  zh: "Chinese",
  ko: "Korean",
};

export const DEFAULT_LANGUAGE: LanguageCode = "nl";

// Valid standard model names, smallest first
export const VALID_WHISPER_MODELS = [
  "tiny",
  "base",
  "small",
  "medium",
  "large",
  "large-v3",
] as const;

export type WhisperModel = (typeof VALID_WHISPER_MODELS)[number];

export const DEFAULT_WHISPER_MODEL: WhisperModel = "medium";

export const MODEL_DESCRIPTIONS: Record<WhisperModel, string> = {
  tiny: "39M params, fastest, basic quality",
  base: "74M params, fast, reasonable quality",
  small: "244M params, good quality",
  medium: "769M params, very good (recommended)",
  large: "1550M params, best quality, slow",
  "large-v3": "1550M params, newest, best for Dutch",
};

// ggml weight files published for whisper.cpp
export const WHISPER_CPP_MODEL_FILES: Record<WhisperModel, string> = {
  tiny: "ggml-tiny.bin",
  base: "ggml-base.bin",
  small: "ggml-small.bin",
  medium: "ggml-medium.bin",
  large: "ggml-large-v2.bin",
  "large-v3": "ggml-large-v3.bin",
};

// Real-time factors for CPU float32 inference, used for time estimates only
export const REAL_TIME_FACTORS: Record<WhisperModel, number> = {
  tiny: 0.6,
  base: 1.0,
  small: 1.6,
  medium: 3.0,
  large: 5.0,
  "large-v3": 5.0,
};

export const DOCUMENT_FORMATS = ["docx", "txt", "srt", "vtt"] as const;

export type DocumentFormat = (typeof DOCUMENT_FORMATS)[number];

// Helper function to validate model names
export function isValidModel(model: string): model is WhisperModel {
  return VALID_WHISPER_MODELS.some((m) => m === model);
}

export function isLanguageCode(code: string): code is LanguageCode {
  return LANGUAGE_CODES.some((c) => c === code);
}
