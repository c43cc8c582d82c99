import {
  scanPlaceholders,
  hasPlaceholder,
  isWholePlaceholder,
  isGeneratorCall,
  referencedNames,
  PlaceholderSyntaxError,
} from '../placeholders.js';

describe('scanPlaceholders', () => {
  it('finds each placeholder with its bounds', () => {
    expect(scanPlaceholders('a ${x} b ${ y }')).toEqual([
      { start: 2, end: 6, content: 'x' },
      { start: 9, end: 15, content: ' y ' },
    ]);
  });

  it('returns only the outermost span of nested placeholders', () => {
    expect(scanPlaceholders('${token_${env}}!')).toEqual([{ start: 0, end: 15, content: 'token_${env}' }]);
  });

  it('ignores a lone dollar sign and bare braces', () => {
    expect(scanPlaceholders('cost $5 {x}')).toEqual([]);
  });

  it('throws on an unterminated placeholder', () => {
    expect(() => scanPlaceholders('x ${open')).toThrow(PlaceholderSyntaxError);
    expect(() => scanPlaceholders('x ${open')).toThrow('Unterminated placeholder starting at index 2: "${open"');
  });

  it('throws on an empty placeholder', () => {
    expect(() => scanPlaceholders('${ }')).toThrow('Empty placeholder at index 0');
  });
});

describe('isWholePlaceholder', () => {
  it('is true only when the placeholder is the entire string', () => {
    expect(isWholePlaceholder('${count}')).toBe(true);
    expect(isWholePlaceholder('${a}${b}')).toBe(false);
    expect(isWholePlaceholder(' ${count}')).toBe(false);
    expect(isWholePlaceholder('n=${count}')).toBe(false);
  });
});

describe('hasPlaceholder / isGeneratorCall', () => {
  it('detects placeholder openings and generator calls', () => {
    expect(hasPlaceholder('a ${b}')).toBe(true);
    expect(hasPlaceholder('a {b}')).toBe(false);
    expect(isGeneratorCall(' fake.email()')).toBe(true);
    expect(isGeneratorCall('faker')).toBe(false);
  });
});

describe('referencedNames', () => {
  it('lists plain names and skips generator calls', () => {
    expect(referencedNames('${base}/users/${id}?n=${fake.word()}')).toEqual(['base', 'id']);
  });

  it('lists the inner names of a composed name', () => {
    expect(referencedNames('${token_${env}}')).toEqual(['env']);
  });
});
