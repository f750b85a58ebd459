import { describe, expect, it } from 'vitest';
import { ModeSwitchDetector, naturalModeOf } from '../src/core/dialogue/ModeSwitchDetector';
import type { Classification } from '../src/types';

function classification(overrides: Partial<Classification>): Classification {
  return { intent: 'Unknown', confidence: 0, switchTarget: null, competitors: [], ...overrides };
}

describe('ModeSwitchDetector', () => {
  const detector = new ModeSwitchDetector();

  it('should map intents to their natural modes', () => {
    expect(naturalModeOf('CancelAppointment')).toBe('Appointment');
    expect(naturalModeOf('KnowledgeQuery')).toBe('Knowledge');
    expect(naturalModeOf('Unknown')).toBeNull();
  });

  it('should offer a switch for a confident intent from the other mode', () => {
    const decision = detector.decide(classification({ intent: 'KnowledgeQuery', confidence: 0.8 }), 'Appointment');
    expect(decision).toEqual({ kind: 'offer', target: 'Knowledge' });
  });

  it('should not offer a switch below the confidence threshold', () => {
    const decision = detector.decide(classification({ intent: 'ScheduleAppointment', confidence: 0.35 }), 'Knowledge');
    expect(decision).toEqual({ kind: 'none' });
  });

  it('should switch at once on an explicit switch request', () => {
    const decision = detector.decide(
      classification({ intent: 'SwitchMode', confidence: 0.95, switchTarget: 'Knowledge' }),
      'Appointment'
    );
    expect(decision).toEqual({ kind: 'switch', target: 'Knowledge', silent: false });
  });

  it('should switch silently when the switch phrase carries a request', () => {
    const decision = detector.decide(
      classification({ intent: 'KnowledgeQuery', confidence: 0.7, switchTarget: 'Knowledge' }),
      'Appointment'
    );
    expect(decision).toEqual({ kind: 'switch', target: 'Knowledge', silent: true });
  });

  it('should report a switch to the mode already active', () => {
    const decision = detector.decide(
      classification({ intent: 'SwitchMode', confidence: 0.95, switchTarget: 'Appointment' }),
      'Appointment'
    );
    expect(decision).toEqual({ kind: 'already', mode: 'Appointment' });
  });

  it.each([
    ['yes', 'accept'],
    ['Sure, go ahead', 'accept'],
    ['switch', 'accept'],
    ['no thanks', 'decline'],
    ['stay here', 'decline'],
    ['book with John', 'ignore'],
  ] as const)('should read "%s" as %s', (text, expected) => {
    expect(detector.readOfferReply(text)).toBe(expected);
  });
});
