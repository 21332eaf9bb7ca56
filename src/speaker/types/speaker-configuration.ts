/**
 * SpeakerConfiguration Interface
 *
 * Runtime settings for the push-to-talk speaker, resolved from the
 * environment file and process environment.
 */

export type ButtonMode = 'hold' | 'toggle';

export type InputKind = 'gpio' | 'keyboard';

export interface SpeakerConfiguration {
  /** Realtime speech API connection and session settings */
  realtime: {
    apiKey: string;
    url: string;
    model: string;
    voice: string;
    instructions: string;
    temperature: number;
    /** Enables user-side transcripts when set, e.g. 'whisper-1' */
    transcriptionModel?: string;
  };

  /** Push-to-talk button settings */
  button: {
    /** BCM GPIO line the button is wired to */
    pin: number;
    /** 'hold' talks while pressed; 'toggle' starts and stops on successive presses */
    mode: ButtonMode;
    bounceMs: number;
    chip: string;
    input: InputKind | 'auto';
  };

  /** ALSA capture and playback settings */
  audio: {
    inputDevice: string;
    outputDevice: string;
    sampleRate: number;
    /** When set, each captured utterance is saved here as WAV */
    recordingsDir?: string;
  };

  /** Use the GPIO button even when no Raspberry Pi is detected */
  forceEnable: boolean;
}
