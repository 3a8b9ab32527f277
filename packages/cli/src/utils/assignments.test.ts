import { parseAssignments } from './assignments';

describe('parseAssignments', () => {
  it('should build a record from field=value pairs', () => {
    expect(parseAssignments(['nombre=Ana', 'ciudad=Lima'])).toEqual({ nombre: 'Ana', ciudad: 'Lima' });
  });

  it('should split on the first equals sign only', () => {
    expect(parseAssignments(['nota=a=b'])).toEqual({ nota: 'a=b' });
  });

  it('should keep empty values and trim field names', () => {
    expect(parseAssignments([' ciudad =', 'x= y '])).toEqual({ ciudad: '', x: ' y ' });
  });

  it('should let a later pair win', () => {
    expect(parseAssignments(['a=1', 'a=2'])).toEqual({ a: '2' });
  });

  it('should return an empty record for no pairs', () => {
    expect(parseAssignments([])).toEqual({});
  });

  it.each(['nombre', '=Ana', '  =x'])('should reject %j', (pair) => {
    expect(() => parseAssignments([pair])).toThrow(`Invalid assignment "${pair}": expected field=value`);
  });
});
