export type OutputMarker = 'ansi' | 'box_drawing';

export interface OutputClassification {
  decorated: boolean;
  markers: OutputMarker[];
}

// CSI (ESC [ ... final byte) and OSC (ESC ] ... BEL or ST).
const ANSI_PATTERN = /\u001b\[[0-?]*[ -/]*[@-~]|\u001b\][^\u0007\u001b]*(?:\u0007|\u001b\\)/;
// Box Drawing block, used by table renderers.
const BOX_DRAWING_PATTERN = /[\u2500-\u257F]/;

export function classifyOutput(text: string): OutputClassification {
  const markers: OutputMarker[] = [];
  if (ANSI_PATTERN.test(text)) markers.push('ansi');
  if (BOX_DRAWING_PATTERN.test(text)) markers.push('box_drawing');
  return { decorated: markers.length > 0, markers };
}

const ANSI_GLOBAL = new RegExp(ANSI_PATTERN.source, 'g');

/** Remove escape sequences, keeping the visible text. */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_GLOBAL, '');
}
