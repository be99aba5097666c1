// tests/compile-grammar.test.ts
import { compileGrammar, loadImpGrammar, resolveGrammarPath } from '../src/grammar/index.js';
import { parseInput } from '../src/parser/index.js';

describe('compileGrammar', () => {
  const calculator = `
    Expression
      = head:Term tail:(_ ("+" / "-") _ Term)* {
          return tail.reduce(
            (result, element) => element[1] === "+" ? result + element[3] : result - element[3],
            head
          );
        }

    Term
      = head:Factor tail:(_ ("*" / "/") _ Factor)* {
          return tail.reduce(
            (result, element) => element[1] === "*" ? result * element[3] : result / element[3],
            head
          );
        }

    Factor
      = "(" _ expr:Expression _ ")" { return expr; }
      / Number

    Number
      = digits:[0-9]+ { return parseInt(digits.join(""), 10); }

    _ "whitespace"
      = [ \\t\\n\\r]*
  `;

  it('should compile valid grammar and return a parser', () => {
    const parser = compileGrammar<number>(calculator, { allowedStartRules: ['Expression'] });
    expect(parser.parse('2 + 3 * 4')).toBe(14);
    expect(parser.options.allowedStartRules).toEqual(['Expression']);
  });

  it('should report parse failures through parseInput', () => {
    const parser = compileGrammar<number>(calculator, { allowedStartRules: ['Expression'] });
    const result = parseInput(parser, '2 +');
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.location?.start.line).toBe(1);
    expect(result.input).toBe('2 +');
  });

  it('should throw and format an invalid grammar', () => {
    const badGrammar = `
      Expression
        = Term "+" Term
    `;
    expect(() => compileGrammar(badGrammar, { allowedStartRules: ['Expression'] })).toThrow(
      /Rule "Term" is not defined/
    );
  });

  it('should load the Imp grammar once', () => {
    expect(loadImpGrammar()).toBe(loadImpGrammar());
    expect(() => resolveGrammarPath([])).toThrow('Imp grammar not found');
  });
});
