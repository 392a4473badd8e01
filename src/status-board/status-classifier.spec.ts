import {
  classifyStatus,
  classifyWorkMode,
  composeNameAndStatus,
  toEventType,
} from './status-classifier';

const today = { year: 2026, month: 1, day: 7 };
const yesterday = { year: 2026, month: 1, day: 6 };

const eventOn = (event: string, localDate = today, note = '') => ({
  event,
  note,
  localDate,
});

describe('status classifier', () => {
  it('maps the fixed event vocabulary', () => {
    expect(classifyStatus(eventOn('Punch In'), { today })).toBe('active');
    expect(classifyStatus(eventOn('Break Start'), { today })).toBe('on break');
    expect(classifyStatus(eventOn('Break End'), { today })).toBe('active');
    expect(classifyStatus(eventOn('On Leave'), { today })).toBe('on leave');
    expect(classifyStatus(eventOn('Lunch'), { today })).toBe('unknown');
    expect(classifyStatus(eventOn(''), { today })).toBe('unknown');
  });

  it('matches labels regardless of case and surrounding whitespace', () => {
    expect(toEventType('  punch in ')).toBe('Punch In');
    expect(toEventType('PUNCH OUT')).toBe('Punch Out');
    expect(toEventType('Punch')).toBeNull();
  });

  describe('Punch Out', () => {
    it('reads as left for the day when it happened today', () => {
      expect(classifyStatus(eventOn('Punch Out', today), { today })).toBe(
        'left for the day',
      );
    });

    it('reads as on leave when it happened on an earlier day', () => {
      expect(classifyStatus(eventOn('Punch Out', yesterday), { today })).toBe(
        'on leave',
      );
    });

    it('honours the marker phrase in the note on any day', () => {
      expect(
        classifyStatus(eventOn('Punch Out', yesterday, 'Left for the day, back Monday'), {
          today,
        }),
      ).toBe('left for the day');
      expect(
        classifyStatus(eventOn('Punch Out', yesterday, 'signing off early'), {
          today,
          leftForDayMarker: 'signing off',
        }),
      ).toBe('left for the day');
    });
  });

  it('does not apply the same-day rule to breaks', () => {
    expect(classifyStatus(eventOn('Break Start', yesterday), { today })).toBe('on break');
    expect(classifyStatus(eventOn('Break End', yesterday), { today })).toBe('active');
  });

  it('derives the work mode from the approved-location flag', () => {
    expect(classifyWorkMode(null)).toBe('Unknown');
    expect(classifyWorkMode(true)).toBe('In Office');
    expect(classifyWorkMode(false)).toBe('Work from home');
  });

  it('composes the name and status label', () => {
    expect(composeNameAndStatus('Asha', 'active')).toBe('Asha 🟢 active');
    expect(composeNameAndStatus('Asha', 'left for the day')).toBe(
      'Asha 🔵 left for the day',
    );
    expect(composeNameAndStatus('', 'unknown')).toBe('⚪ unknown');
  });
});
