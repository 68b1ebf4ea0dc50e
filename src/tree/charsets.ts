import { GraphicsVariant, type TreeChars } from '../types/index.js';
import { InvalidGraphicsError } from '../utils/pstree-error.js';

const ASCII: TreeChars = {
  S2: '--',
  P: '-+',
  PGL: '=',
  NPGL: '-',
  BarC: '|',
  Bar: '|',
  BarL: '\\',
  SG: '',
  EG: '',
  Init: '',
};

// IBM code page 850 line drawing, kept as the raw byte values (0xC4, 0xC2, ...)
const PC850: TreeChars = {
  S2: '\xc4\xc4',
  P: '\xc4\xc2',
  PGL: '\xfa',
  NPGL: '\xc4',
  BarC: '\xc3',
  Bar: '\xb3',
  BarL: '\xc0',
  SG: '',
  EG: '',
  Init: '',
};

// DEC special graphics: letters draw lines between SO and SI
const VT100: TreeChars = {
  S2: 'qq',
  P: 'qw',
  PGL: '`',
  NPGL: 'q',
  BarC: 't',
  Bar: 'x',
  BarL: 'm',
  SG: '\x0e',
  EG: '\x0f',
  Init: '\x1b(B\x1b)0',
};

const UTF8: TreeChars = {
  S2: '──',
  P: '─┬',
  PGL: '=',
  NPGL: '─',
  BarC: '├',
  Bar: '│',
  BarL: '└',
  SG: '',
  EG: '',
  Init: '',
};

const TREE_CHARS: Record<GraphicsVariant, TreeChars> = {
  [GraphicsVariant.Ascii]: ASCII,
  [GraphicsVariant.Pc850]: PC850,
  [GraphicsVariant.Vt100]: VT100,
  [GraphicsVariant.Utf8]: UTF8,
};

export function isGraphicsVariant(value: number): value is GraphicsVariant {
  return Object.values(GraphicsVariant).some((variant) => variant === value);
}

export function getTreeChars(variant: number): TreeChars {
  if (!isGraphicsVariant(variant)) {
    throw new InvalidGraphicsError(variant);
  }
  return TREE_CHARS[variant];
}
