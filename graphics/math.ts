import {Operation} from '../models';
import {concatMatrix} from '../operators';

/**
> Because a transformation matrix has only six elements that can be changed, in most cases in PDF it shall be specified as the six-element array [a b c d e f].

                 ⎡ a b 0 ⎤
[a b c d e f] => ⎢ c d 0 ⎥
                 ⎣ e f 1 ⎦

*/
export type Matrix = [number, number, number, number, number, number];

// normalizes -0, so an unrotated matrix is exactly [sx, 0, 0, sy, tx, ty]
function unsigned(value: number): number {
  return value + 0;
}

/**
Scale, then rotate (counter-clockwise, in degrees), then translate.
*/
export class Transform {
  constructor(public scaleX = 1,
              public scaleY = 1,
              public rotation = 0,
              public translateX = 0,
              public translateY = 0) { }

  static identity(): Transform {
    return new Transform();
  }

  static translate(x: number, y: number): Transform {
    return new Transform(1, 1, 0, x, y);
  }

  static translateScale(x: number, y: number, scale: number): Transform {
    return new Transform(scale, scale, 0, x, y);
  }

  static translateScaleXY(x: number, y: number, scaleX: number, scaleY: number): Transform {
    return new Transform(scaleX, scaleY, 0, x, y);
  }

  static full(x: number, y: number, scaleX: number, scaleY: number, rotation: number): Transform {
    return new Transform(scaleX, scaleY, rotation, x, y);
  }

  toMatrix(): Matrix {
    const radians = this.rotation * Math.PI / 180;
    const cos = Math.cos(radians);
    const sin = Math.sin(radians);
    return [
      unsigned(this.scaleX * cos),
      unsigned(this.scaleX * sin),
      unsigned(-this.scaleY * sin),
      unsigned(this.scaleY * cos),
      this.translateX,
      this.translateY,
    ];
  }

  toOperation(): Operation {
    return concatMatrix(...this.toMatrix());
  }
}
