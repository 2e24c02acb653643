
export type ColorFormatter = (val: unknown) => string;

const plain: ColorFormatter = (val) => `${val}`;

export class CliColors {

  /*
    comb([ a, b ])(s) === a(b(s))
  */
  static comb(fns: ColorFormatter[]): ColorFormatter {
    return fns.reduce((fmtFn, currFn) => {
      return (val: unknown) => fmtFn(currFn(val));
    }, plain);
  }

  /*
    returns fmtFn unchanged, or a formatter that only stringifies when
      colors are off (non-TTY output, NO_COLOR)
  */
  static when(enabled: boolean, fmtFn: ColorFormatter): ColorFormatter {
    return enabled ? fmtFn : plain;
  }

  static rgb(r: number, g: number, b: number): ColorFormatter {
    return (val: unknown) => {
      return `\x1B[38;2;${r};${g};${b}m${val}\x1B[39m`;
    };
  }
  static dim(val: unknown) {
    return `\x1B[2m${val}\x1B[22m`;
  }
  static bold(val: unknown) {
    return `\x1B[1m${val}\x1B[22m`;
  }
}
