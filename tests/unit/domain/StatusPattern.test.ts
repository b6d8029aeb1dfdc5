import { StatusPattern } from '../../../src/domain/probes/StatusPattern';

describe('StatusPattern', () => {
  it('should match exact codes', () => {
    const pattern = StatusPattern.parse('403');

    expect(pattern.matches(403)).toBe(true);
    expect(pattern.matches(404)).toBe(false);
  });

  it('should match status classes', () => {
    const pattern = StatusPattern.parse('2xx');

    expect(pattern.matches(200)).toBe(true);
    expect(pattern.matches(299)).toBe(true);
    expect(pattern.matches(300)).toBe(false);
  });

  it('should match inclusive ranges', () => {
    const pattern = StatusPattern.parse('200-204');

    expect(pattern.matches(200)).toBe(true);
    expect(pattern.matches(204)).toBe(true);
    expect(pattern.matches(205)).toBe(false);
  });

  it('should combine comma separated tokens', () => {
    const pattern = StatusPattern.parse(' 200, 4XX ');

    expect(pattern.matches(200)).toBe(true);
    expect(pattern.matches(451)).toBe(true);
    expect(pattern.matches(500)).toBe(false);
    expect(pattern.toString()).toBe('200, 4XX');
  });

  it('should reject malformed patterns', () => {
    expect(() => StatusPattern.parse(' , ')).toThrow("Empty status pattern: ' , '");
    expect(() => StatusPattern.parse('200,abc')).toThrow("Invalid status token 'abc' in pattern '200,abc'");
    expect(() => StatusPattern.parse('299-200')).toThrow("Invalid status range '299-200' in pattern '299-200'");
  });

  describe('validate', () => {
    it('should return null for valid patterns', () => {
      expect(StatusPattern.validate('200,403')).toBeNull();
    });

    it('should return the problem for invalid patterns', () => {
      expect(StatusPattern.validate('6xx')).toBe("Invalid status token '6xx' in pattern '6xx'");
    });
  });
});
