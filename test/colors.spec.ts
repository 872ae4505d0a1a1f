import { colorSupported } from '../src/lib/ui/colors';

describe('colorSupported', () => {
  const tty = { isTTY: true };

  test('on when every stream is a terminal', () => {
    expect(colorSupported({}, [tty, tty])).toBe(true);
  });

  test('off when output is piped', () => {
    expect(colorSupported({}, [{}, tty])).toBe(false);
    expect(colorSupported({}, [tty, { isTTY: false }])).toBe(false);
  });

  test('NO_COLOR wins over a terminal', () => {
    expect(colorSupported({ NO_COLOR: '1' }, [tty, tty])).toBe(false);
  });
});
