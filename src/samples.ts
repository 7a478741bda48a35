export interface Sample {
  label: string;
  code: string;
}

export const SAMPLES: readonly Sample[] = [
  { label: 'Simple Syntax Error', code: "def foo()\n    print('Hello')" },
  { label: 'Division by Zero', code: 'x = 1\ny = 0\nprint(x / y)' },
  { label: 'Uninitialized Variable', code: 'def bar():\n    print(a)' },
  { label: 'Debug Print', code: "def test():\n    print('debug')\n    return 42" },
];
