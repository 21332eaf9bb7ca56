/**
 * Commands routed from input devices to the voice session.
 */

export type SpeakerCommand = 'startListening' | 'stopListening' | 'toggle' | 'stopPlayback';
