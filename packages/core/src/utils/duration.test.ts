import { DurationParseError, formatDuration, parseDuration } from './duration';

describe('parseDuration', () => {
  it('should parse single-unit durations', () => {
    expect(parseDuration('300ms')).toBe(300);
    expect(parseDuration('30s')).toBe(30_000);
    expect(parseDuration('5m')).toBe(300_000);
    expect(parseDuration('2h')).toBe(7_200_000);
  });

  it('should sum compound durations', () => {
    expect(parseDuration('1h30m')).toBe(5_400_000);
    expect(parseDuration('1m30s500ms')).toBe(90_500);
  });

  it('should accept fractional amounts', () => {
    expect(parseDuration('1.5h')).toBe(5_400_000);
    expect(parseDuration('.5s')).toBe(500);
  });

  it('should accept a bare zero', () => {
    expect(parseDuration('0')).toBe(0);
  });

  it.each(['', '10', 'abc', '5 m', '-5m', '5x', '1h30'])('should reject %p', (input) => {
    expect(() => parseDuration(input)).toThrow(DurationParseError);
  });

  it('should include the input in the error message', () => {
    expect(() => parseDuration('soon')).toThrow('invalid duration "soon"');
  });
});

describe('formatDuration', () => {
  it('should format sub-second values in milliseconds', () => {
    expect(formatDuration(500)).toBe('500ms');
  });

  it('should format seconds, minutes and hours', () => {
    expect(formatDuration(30_000)).toBe('30s');
    expect(formatDuration(1_500)).toBe('1.5s');
    expect(formatDuration(300_000)).toBe('5m0s');
    expect(formatDuration(5_400_000)).toBe('1h30m0s');
  });
});
