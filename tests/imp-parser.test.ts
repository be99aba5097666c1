import { ImpSyntaxError, parseImp } from '../src/imp/parser.js';

describe('Imp grammar', () => {
  test('statements end with a semicolon or a newline', () => {
    const program = parseImp('int a\nint b;\n');
    expect(program.type).toBe('Program');
    expect(program.body.map(stmt => [stmt.type, stmt.line])).toEqual([
      ['Declaration', 1],
      ['Declaration', 2],
    ]);
  });

  test('declarations carry label, arrays and initializers', () => {
    const [decl] = parseImp('const int v[8], w = 3;').body;
    expect(decl).toEqual({
      type: 'Declaration',
      label: 'const',
      declType: 'int',
      items: [
        { name: 'v', init: null, size: '8', line: 1 },
        { name: 'w', init: { type: 'Literal', literalType: 'int', text: '3', line: 1 }, size: null, line: 1 },
      ],
      line: 1,
    });
  });

  test('same-operator chains fold into one node', () => {
    const [stmt] = parseImp('x = a + b + c').body;
    expect(stmt.type).toBe('Assign');
    if (stmt.type !== 'Assign') return;
    expect(stmt.value.type).toBe('Binary');
    if (stmt.value.type !== 'Binary') return;
    expect(stmt.value.op).toBe('+');
    expect(stmt.value.operands.map(operand => operand.type)).toEqual(['Identifier', 'Identifier', 'Identifier']);
  });

  test('mixed operators nest left to right', () => {
    const [stmt] = parseImp('a - b + c').body;
    expect(stmt.type).toBe('ExprStmt');
    if (stmt.type !== 'ExprStmt' || stmt.expr.type !== 'Binary') throw new Error('expected a binary expression');
    expect(stmt.expr.op).toBe('+');
    const [left] = stmt.expr.operands;
    expect(left.type === 'Binary' && left.op).toBe('-');
  });

  test('double-character logical operators are accepted', () => {
    const [stmt] = parseImp('ok = a < b && c || d').body;
    if (stmt.type !== 'Assign' || stmt.value.type !== 'Binary') throw new Error('expected a binary value');
    expect(stmt.value.op).toBe('|');
    const [left] = stmt.value.operands;
    expect(left.type === 'Binary' && left.op).toBe('&');
  });

  test('casts, addresses, dereferences and indexing', () => {
    const body = parseImp('y = [float] x\np = &x\nv[2] = *p\n').body;
    expect(body.map(stmt => (stmt.type === 'Assign' ? [stmt.target.type, stmt.value.type] : null))).toEqual([
      ['Identifier', 'Cast'],
      ['Identifier', 'Address'],
      ['Index', 'Deref'],
    ]);
  });

  test('functions, forward declarations and control flow', () => {
    const source = [
      'float scale(float x, int k);',
      'int main() {',
      '  while (done) { }',
      '  for (i = 0; i < 3; i = i + 1) { }',
      '  if (a) { } else if (b) { } else { }',
      '  return 0',
      '}',
    ].join('\n');
    const [forward, main] = parseImp(source).body;

    expect(forward).toMatchObject({ type: 'Function', name: 'scale', body: null });
    expect(forward.type === 'Function' && forward.params).toEqual([
      { paramType: 'float', name: 'x' },
      { paramType: 'int', name: 'k' },
    ]);
    if (main.type !== 'Function' || !main.body) throw new Error('expected a function definition');
    expect(main.body.body.map(stmt => [stmt.type, stmt.line])).toEqual([
      ['While', 3],
      ['For', 4],
      ['If', 5],
      ['Return', 6],
    ]);
  });

  test('comments are whitespace', () => {
    const body = parseImp('int a // first\n/* second */ int b;').body;
    expect(body).toHaveLength(2);
  });

  test('syntax errors carry their location', () => {
    let caught: unknown;
    try {
      parseImp('int = 5;', { grammarSource: 'bad.imp' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ImpSyntaxError);
    if (!(caught instanceof ImpSyntaxError)) return;
    expect(caught.message.startsWith('[Imp Syntax Error]')).toBe(true);
    expect(caught.location?.start.line).toBe(1);
    expect(caught.input).toBe('int = 5;');
  });
});
