/**
 * Scripted P100 behaviour for facade tests.
 */

import { confirmFeedback, type Responder } from './fake-transport.js';

export interface FakeDeviceState {
  power: 0 | 1;
  volume: number;
  muted: boolean;
  source: number;
  audioMode: number;
}

export const SOURCES = ['Blu-ray', 'DVD Player', 'Tuner'];
export const AUDIO_MODES = ['Bypass', 'Stereo', 'Surround'];

/**
 * A responder that keeps device state between commands and answers the
 * way the processor does at feedback level 1.
 */
export function createFakeDevice(initial: Partial<FakeDeviceState> = {}): {
  state: FakeDeviceState;
  responder: Responder;
} {
  const state: FakeDeviceState = { power: 1, volume: -350, muted: false, source: 1, audioMode: 0, ...initial };

  const list = (countVerb: string, verb: string, names: readonly string[]): string[] => [
    `!${countVerb}(${String(names.length)})\r`,
    ...names.map((name, index) => `!${verb}(${String(index)})"${name}"\r`),
  ];

  const responder: Responder = (text) => {
    const select = /^(SRC|AUDMODE)\((\d+)\)$/.exec(text);
    if (select) {
      const index = Number(select[2]);
      if (select[1] === 'SRC') {
        state.source = index;
        return [`!SRC(${String(index)})"${SOURCES[index] ?? ''}"\r`];
      }
      state.audioMode = index;
      return [`!AUDMODE(${String(index)})"${AUDIO_MODES[index] ?? ''}"\r`];
    }

    switch (text) {
      case 'POWER?':
        return [`!POWER(${String(state.power)})\r`];
      case 'POWERONMAIN':
        state.power = 1;
        return ['!POWERONMAIN\r'];
      case 'POWEROFFMAIN':
        state.power = 0;
        return ['!POWEROFFMAIN\r'];
      case 'VOL?':
        return [`!VOL(${String(state.volume)})\r`];
      case 'MUTE?':
        return [`!MUTE(${state.muted ? '1' : '0'})\r`];
      case 'MUTEON':
        state.muted = true;
        return ['!MUTEON\r'];
      case 'SRC?':
        return [`!SRC(${String(state.source)})"${SOURCES[state.source] ?? ''}"\r`];
      case 'SRCS?':
        return list('SRCCOUNT', 'SRC', SOURCES);
      case 'AUDMODE?':
        return [`!AUDMODE(${String(state.audioMode)})"${AUDIO_MODES[state.audioMode] ?? ''}"\r`];
      case 'AUDMODEL?':
        return list('AUDMODECOUNT', 'AUDMODE', AUDIO_MODES);
      case 'AUDTYPE?':
        return ['!AUDTYPE("PCM 2.0")\r'];
      default:
        return confirmFeedback(text);
    }
  };

  return { state, responder };
}
