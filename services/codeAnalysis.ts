import type { BlockDefinition, Suggestion } from '../types';

export interface CodeDetails {
  buttonsUsed: string[];
  soundTypes: string[];
  gestures: string[];
  iconsShown: string[];
  stringsShown: string[];
  radioMessages: string[];
  digitalPinsRead: string[];
  digitalPinsWritten: string[];
  analogPinsRead: string[];
  accelerationDimensions: string[];
}

export type CodeStructure = 'simple' | 'conditional' | 'complex';

export interface CodeAnalysis {
  triggers: string[];
  actions: string[];
  sensors: string[];
  pins: string[];
  radio: boolean;
  logic: string[];
  details: CodeDetails;
  structure: CodeStructure;
}

export type BlockResolver = (label: string) => BlockDefinition | undefined;

function unique(values: string[]): string[] {
  return Array.from(new Set(values));
}

function capture(code: string, pattern: RegExp): string[] {
  return unique(Array.from(code.matchAll(pattern), (match) => match[1]));
}

function plural(items: string[], word: string): string {
  return items.length > 1 ? `${word}s` : word;
}

/**
 * Static read of generated MakeCode: which triggers, actions, sensors, pins
 * and logic the student used. Drives targeted suggestions and the cache key.
 */
export function analyzeStudentCode(code: string): CodeAnalysis {
  const details: CodeDetails = {
    buttonsUsed: capture(code, /Button\.(AB|A|B)\b/g),
    soundTypes: capture(code, /onSound\(DetectedSound\.(\w+)/g),
    gestures: capture(code, /onGesture\(Gesture\.(\w+)/g),
    iconsShown: capture(code, /showIcon\(IconNames\.(\w+)/g),
    stringsShown: capture(code, /showString\("([^"]+)"/g),
    radioMessages: capture(code, /sendString\("([^"]+)"/g),
    digitalPinsRead: capture(code, /digitalReadPin\(DigitalPin\.(P\d+)/g),
    digitalPinsWritten: capture(code, /digitalWritePin\(DigitalPin\.(P\d+)/g),
    analogPinsRead: capture(code, /analogReadPin\(AnalogPin\.(P\d+)/g),
    accelerationDimensions: capture(code, /acceleration\(Dimension\.(\w+)/g),
  };

  const triggers: string[] = [];
  const actions: string[] = [];
  const sensors: string[] = [];
  const logic: string[] = [];

  // Triggers
  for (const button of capture(code, /onButtonPressed\(Button\.(AB|A|B)\b/g)) triggers.push(`button_${button}`);
  for (const sound of details.soundTypes) triggers.push(`sound_${sound}`);
  for (const gesture of details.gestures) triggers.push(`gesture_${gesture}`);
  if (code.includes('radio.onReceived')) triggers.push('radio_received');

  // Actions
  if (details.iconsShown.length > 0) actions.push('show_icon');
  if (code.includes('showString')) actions.push('show_string');
  if (code.includes('showNumber')) actions.push('show_number');
  if (code.includes('playTone')) actions.push('play_tone');
  if (code.includes('music.play(')) actions.push('play_sound');
  if (code.includes('radio.sendString') || code.includes('radio.sendNumber')) actions.push('send_radio_message');
  if (details.digitalPinsRead.length > 0) actions.push('read_digital_pin');
  if (details.digitalPinsWritten.length > 0) actions.push('write_digital_pin');
  if (details.analogPinsRead.length > 0) actions.push('read_analog_pin');

  // Sensors
  if (code.includes('lightLevel')) sensors.push('light');
  if (code.includes('temperature()')) sensors.push('temperature');
  if (details.accelerationDimensions.length > 0) sensors.push('acceleration');
  if (code.includes('soundLevel')) sensors.push('sound');
  if (code.includes('compassHeading')) sensors.push('compass');

  // Logic
  const conditions = code.split('\n').filter((line) => /\bif \(/.test(line));
  if (conditions.length > 0) {
    logic.push('conditional');
    if (conditions.some((line) => line.includes('&&'))) logic.push('and_condition');
    if (conditions.some((line) => line.includes('||'))) logic.push('or_condition');
    if (conditions.some((line) => /[<>]|==/.test(line))) logic.push('comparison');
  }
  if (/\belse\b/.test(code)) logic.push('else_branch');

  const structure: CodeStructure =
    conditions.length > 1 ? 'complex' : conditions.length === 1 ? 'conditional' : 'simple';

  return {
    triggers: unique(triggers),
    actions: unique(actions),
    sensors: unique(sensors),
    pins: unique([...details.digitalPinsRead, ...details.digitalPinsWritten, ...details.analogPinsRead]),
    radio: actions.includes('send_radio_message') || triggers.includes('radio_received'),
    logic: unique(logic),
    details,
    structure,
  };
}

// Specific praise built from what the code does, or undefined if nothing stood out
export function targetedEncouragement(analysis: CodeAnalysis): string | undefined {
  const { details, logic } = analysis;
  const parts: string[] = [];

  if (details.buttonsUsed.length > 0) {
    parts.push(`using ${plural(details.buttonsUsed, 'button')} ${details.buttonsUsed.join(', ')}`);
  }
  if (details.digitalPinsRead.length > 0) {
    parts.push(`reading digital ${plural(details.digitalPinsRead, 'pin')} ${details.digitalPinsRead.join(', ')}`);
  }
  if (details.digitalPinsWritten.length > 0) {
    parts.push(`controlling digital ${plural(details.digitalPinsWritten, 'pin')} ${details.digitalPinsWritten.join(', ')}`);
  }
  if (details.iconsShown.length > 0) {
    parts.push(`showing ${details.iconsShown.join(', ')} ${plural(details.iconsShown, 'icon')}`);
  }
  if (details.radioMessages.length > 0) {
    const messages = details.radioMessages.map((message) => `"${message}"`).join(', ');
    parts.push(`sending radio ${plural(details.radioMessages, 'message')} ${messages}`);
  }
  if (logic.includes('and_condition')) parts.push('combining conditions with and');
  if (logic.includes('comparison')) parts.push('comparing values');

  if (parts.length === 0) return undefined;
  return `Great work! You're ${parts.join(' and ')} - that's smart programming!`;
}

export const DEFAULT_IDEA = 'What if you added a light sensor (LIGHT LEVEL) to make your program respond to the environment?';

/**
 * Next-step idea for a recognized pattern. Block labels sit in parentheses so
 * they can be resolved back to catalog blocks. Undefined when no rule applies.
 */
export function targetedIdea(analysis: CodeAnalysis): string | undefined {
  const { actions, triggers, logic, details } = analysis;
  const pin = details.digitalPinsRead[0] ?? 'P0';

  if (actions.includes('read_digital_pin') && details.iconsShown.includes('No') && logic.includes('and_condition')) {
    return `What if you displayed the actual value of pin ${pin} (SHOW NUMBER) after showing the 'No' icon?`;
  }
  if (actions.includes('read_digital_pin') && logic.includes('comparison') && actions.includes('send_radio_message')) {
    return `What if you displayed the actual value of pin ${pin} (SHOW NUMBER) instead of just sending a radio message?`;
  }
  if (actions.includes('read_digital_pin') && logic.includes('comparison')) {
    return `What if you used the light sensor (LIGHT LEVEL) to compare with pin ${pin} values?`;
  }
  if (triggers.includes('button_A') && actions.includes('show_icon') && !analysis.radio) {
    const icon = details.iconsShown[0] ?? 'Heart';
    return `What if you added sound effects (PLAY SOUND) when you press (ON BUTTON A) to go with your ${icon} icon?`;
  }
  if (actions.includes('send_radio_message') && actions.includes('show_icon')) {
    return 'What if you changed the icon (SHOW ICON) based on radio messages you receive (GET A MESSAGE)?';
  }
  if (triggers.includes('sound_Loud') || triggers.includes('sound_Quiet')) {
    return 'What if you used the temperature sensor (TEMPERATURE) to show different icons (SHOW ICON) based on how hot it is?';
  }
  if (triggers.includes('button_A') && actions.length === 1) {
    return 'What if you added button B (ON BUTTON B) to do something different (SHOW ICON)?';
  }
  return undefined;
}

const PRESS_PHRASING = /^(?:on\s+)?(?:press(?:ed)?|when\s+you\s+press|when\s+pressed)\s+(?:button\s+)?(a\s*\+\s*b|ab|a|b)$/i;

/**
 * Resolve the parenthesized block labels in an idea to catalog identifiers,
 * in order of first mention, without repeats.
 */
export function extractBlockReferences(text: string, resolve: BlockResolver): string[] {
  const ids: string[] = [];
  for (const match of text.matchAll(/\(([^()]+)\)/g)) {
    let token = match[1].trim().replace(/\s+/g, ' ');
    if (!token) continue;

    const press = PRESS_PHRASING.exec(token);
    if (press) token = `on button ${press[1].replace(/\s+/g, '')} pressed`;

    const definition = resolve(token);
    if (definition && !ids.includes(definition.id)) ids.push(definition.id);
  }
  return ids;
}

export function buildTargetedSuggestion(code: string, resolve: BlockResolver): Suggestion | undefined {
  const analysis = analyzeStudentCode(code);
  const encouragement = targetedEncouragement(analysis);
  const idea = targetedIdea(analysis);
  if (!encouragement && !idea) return undefined;

  const finalIdea = idea ?? DEFAULT_IDEA;
  return {
    encouragement: encouragement ?? "Excellent coding! You're building interactive programs!",
    idea: finalIdea,
    blocks: extractBlockReferences(finalIdea, resolve),
  };
}
