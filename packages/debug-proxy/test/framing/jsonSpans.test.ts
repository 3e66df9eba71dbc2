import { expect } from 'chai';
import {
  arrayElementSpans,
  locateValue,
  replaceValue,
  truncateArray,
} from '../../src/framing/jsonSpans';

const STACK = '{"id":3,"result":{"Locations":[{"pc":18446744073709551615,"line":1},{"pc":2,"line":2},{"pc":3,"line":3}]},"error":null}';

describe('jsonSpans', () => {
  describe('locateValue', () => {
    it('finds nested members and array elements', () => {
      const text = '{ "params" : [ { "Scope": {"Frame": 2 } } ], "id": 1 }';
      const span = locateValue(text, ['params', 0, 'Scope', 'Frame']);

      expect(span).to.not.equal(undefined);
      expect(text.slice(span?.start, span?.end)).to.equal('2');
    });

    it('returns the raw text of large integers', () => {
      const span = locateValue(STACK, ['result', 'Locations', 0, 'pc']);
      expect(STACK.slice(span?.start, span?.end)).to.equal('18446744073709551615');
    });

    it('matches keys written with escapes', () => {
      const text = '{"a\\u0062":true}';
      const span = locateValue(text, ['ab']);
      expect(text.slice(span?.start, span?.end)).to.equal('true');
    });

    it('returns undefined for missing or mistyped steps', () => {
      expect(locateValue(STACK, ['result', 'State'])).to.equal(undefined);
      expect(locateValue(STACK, ['id', 'x'])).to.equal(undefined);
      expect(locateValue(STACK, ['result', 'Locations', 7])).to.equal(undefined);
    });

    it('throws on malformed input', () => {
      expect(() => locateValue('{"a":', ['a'])).to.throw(SyntaxError);
      expect(() => locateValue('{"a":"open', ['a'])).to.throw(SyntaxError, 'Unterminated string');
    });
  });

  it('lists array element spans', () => {
    const spans = arrayElementSpans('{"xs":[1, "two" ,{"n":[3]}]}', ['xs']);
    expect(spans?.map((s) => '{"xs":[1, "two" ,{"n":[3]}]}'.slice(s.start, s.end))).to.deep.equal([
      '1',
      '"two"',
      '{"n":[3]}',
    ]);
  });

  describe('truncateArray', () => {
    it('keeps a prefix and leaves the rest of the text untouched', () => {
      expect(truncateArray(STACK, ['result', 'Locations'], 1)).to.equal(
        '{"id":3,"result":{"Locations":[{"pc":18446744073709551615,"line":1}]},"error":null}',
      );
    });

    it('empties the array when keeping nothing', () => {
      expect(truncateArray(STACK, ['result', 'Locations'], 0)).to.equal(
        '{"id":3,"result":{"Locations":[]},"error":null}',
      );
    });

    it('returns the input when the array is already short enough', () => {
      expect(truncateArray(STACK, ['result', 'Locations'], 3)).to.equal(STACK);
    });

    it('returns undefined when the path is not an array', () => {
      expect(truncateArray(STACK, ['id'], 1)).to.equal(undefined);
      expect(truncateArray(STACK, ['result', 'Missing'], 1)).to.equal(undefined);
    });
  });

  it('replaces a value in place', () => {
    const text = '{"method":"RPCServer.Eval","params":[{"Scope":{"GoroutineID":-1,"Frame":1}}],"id":5}';
    expect(replaceValue(text, ['params', 0, 'Scope', 'Frame'], '3')).to.equal(
      '{"method":"RPCServer.Eval","params":[{"Scope":{"GoroutineID":-1,"Frame":3}}],"id":5}',
    );
    expect(replaceValue(text, ['params', 0, 'Nope'], '3')).to.equal(undefined);
  });
});
