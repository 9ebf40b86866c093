import { escapeCsvField, toCsvRow } from './csv';

describe('escapeCsvField', () => {
  it('should leave plain values untouched', () => {
    expect(escapeCsvField('dbservice')).toBe('dbservice');
    expect(escapeCsvField('')).toBe('');
  });

  it('should quote values containing commas', () => {
    expect(escapeCsvField('a@example.com, b@example.com')).toBe('"a@example.com, b@example.com"');
  });

  it('should double embedded quotes', () => {
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
  });

  it('should quote values containing line breaks', () => {
    expect(escapeCsvField('line1\nline2')).toBe('"line1\nline2"');
    expect(escapeCsvField('line1\rline2')).toBe('"line1\rline2"');
  });
});

describe('toCsvRow', () => {
  it('should join escaped fields and end with CRLF', () => {
    expect(toCsvRow(['2024-01-15 08:30:00', 'dbservice', 'DOWN', 'true', 'Email', 'a@x.com, b@x.com'])).toBe(
      '2024-01-15 08:30:00,dbservice,DOWN,true,Email,"a@x.com, b@x.com"\r\n',
    );
  });
});
