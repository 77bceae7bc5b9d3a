import {inflate} from 'pako';
import {
  PDFArray,
  PDFContentStream,
  PDFDict,
  PDFName,
  PDFNumber,
  PDFObject,
  PDFRawStream,
  PDFStream,
} from 'pdf-lib';

export interface List<T> {
  [index: number]: T;
  length: number;
}

/**
FILTER name     [Has Parameters] Description
ASCIIHexDecode  [no]    Decodes data encoded in an ASCII hexadecimal representation, reproducing the original binary data.
ASCII85Decode   [no]    Decodes data encoded in an ASCII base-85 representation, reproducing the original binary data.
FlateDecode     [yes]   (PDF 1.2) Decompresses data encoded using the zlib/deflate compression method, reproducing the original text or binary data.

The remaining standard filters (LZWDecode, RunLengthDecode, CCITTFaxDecode,
JBIG2Decode, DCTDecode, JPXDecode, Crypt) apply to image data or encryption
and never to the page content this library reads.
*/
export type Decoder = (data: Uint8Array, decodeParms?: PDFDict) => Uint8Array;

/**
A group of base-85 digits (1 to 5 of them) or the 'z' shorthand for four
zero bytes.
*/
type ASCII85Token = number[] | 'ZERO';

/**
This returns a function that can be called multiple times; each call returns
the next token, or undefined once the input (or the ~> EOF marker) has been
reached.
*/
function ASCII85Lexer(input: List<number>): () => ASCII85Token | undefined {
  let i = 0;
  return function() {
    const stack: number[] = [];
    while (i <= input.length) {
      const next = input[i++];
      if (next === undefined || (next == 126 && input[i] == 62)) { // '~>'
        i = input.length + 1;
        return stack.length !== 0 ? stack : undefined;
      }
      else if (next == 0 || next == 9 || next == 10 || next == 12 || next == 13 || next == 32) {
        // ignore whitespace
      }
      else if (next == 122) { // 'z'
        if (stack.length !== 0) {
          throw new Error('The "z" character cannot occur in the middle of a group');
        }
        return 'ZERO';
      }
      else if (next < 33 || next > 117) {
        throw new Error(`Invalid ASCII85 character code: ${next}`);
      }
      else if (stack.push(next) === 5) {
        return stack;
      }
    }
    return undefined;
  };
}

/**
`ascii` is a buffer in base-85 encoding. The output is roughly 4/5 as long.

All values are in the range 0x21-0x75 == 33-117 == '!'-'u' and 0x7A == 122 == 'z'

0x7E,0x3E == 126,62 == '~>' serves as the EOF marker

While decoding, all whitespace is ignored (PDF32000_2008.pdf:7.4.3).
*/
export function ASCII85Decode(ascii: List<number>): Buffer {
  const bytes: number[] = [];
  const lex = ASCII85Lexer(ascii);
  for (let token = lex(); token !== undefined; token = lex()) {
    if (token === 'ZERO') {
      bytes.push(0, 0, 0, 0);
      continue;
    }
    if (token.length === 1) {
      throw new Error('The final ASCII85 group must contain at least two characters');
    }
    // pad the final group with u's == 117
    const padded = token.concat(117, 117, 117, 117).slice(0, 5);
    // the sum can exceed 2^31, so use arithmetic rather than bit shifts
    const sum = padded.reduce((total, code) => total * 85 + (code - 33), 0);
    const group = [
      Math.floor(sum / 16777216) % 256,
      Math.floor(sum / 65536) % 256,
      Math.floor(sum / 256) % 256,
      sum % 256,
    ];
    // a final group of n characters holds n - 1 bytes
    bytes.push(...group.slice(0, token.length - 1));
  }
  return Buffer.from(bytes);
}

/**
> The ASCIIHexDecode filter shall produce one byte of binary data for each pair of ASCII hexadecimal digits (0–9 and A–F or a–f). All white-space characters (see 7.2, "Lexical Conventions") shall be ignored. A GREATER-THAN SIGN (3Eh) indicates EOD. Any other characters shall cause an error. If the filter encounters the EOD marker after reading an odd number of hexadecimal digits, it shall behave as if a 0 (zero) followed the last digit.
*/
export function ASCIIHexDecode(ascii: List<number>): Buffer {
  const text = Buffer.from(Array.from({length: ascii.length}, (_, i) => ascii[i])).toString('ascii');
  const end = text.indexOf('>');
  const digits = (end === -1 ? text : text.slice(0, end)).replace(/[\0\t\n\f\r ]/g, '');
  if (/[^0-9A-Fa-f]/.test(digits)) {
    throw new Error(`Invalid ASCIIHex data: "${digits}"`);
  }
  const even = digits.length % 2 === 0 ? digits : `${digits}0`;
  return Buffer.from(even, 'hex');
}

function readPredictor(decodeParms?: PDFDict): number {
  const predictor = decodeParms && decodeParms.lookup(PDFName.of('Predictor'));
  return predictor instanceof PDFNumber ? predictor.asNumber() : 1;
}

export function FlateDecode(data: Uint8Array, decodeParms?: PDFDict): Buffer {
  const predictor = readPredictor(decodeParms);
  if (predictor > 1) {
    throw new Error(`Unsupported DecodeParms.Predictor value: "${predictor}"`);
  }
  return Buffer.from(inflate(data));
}

const decoders = new Map<PDFName, Decoder>([
  [PDFName.of('FlateDecode'), FlateDecode],
  [PDFName.of('Fl'), FlateDecode],
  [PDFName.of('ASCIIHexDecode'), ASCIIHexDecode],
  [PDFName.of('AHx'), ASCIIHexDecode],
  [PDFName.of('ASCII85Decode'), ASCII85Decode],
  [PDFName.of('A85'), ASCII85Decode],
]);

function filterNames(filter: PDFObject | undefined): PDFName[] {
  if (filter instanceof PDFName) {
    return [filter];
  }
  if (filter instanceof PDFArray) {
    const array = filter;
    return array.asArray().map((_, index) => array.lookup(index)).filter((item): item is PDFName => item instanceof PDFName);
  }
  return [];
}

function filterParms(decodeParms: PDFObject | undefined): Array<PDFDict | undefined> {
  if (decodeParms instanceof PDFDict) {
    return [decodeParms];
  }
  if (decodeParms instanceof PDFArray) {
    const array = decodeParms;
    return array.asArray().map((_, index) => {
      const item = array.lookup(index);
      return item instanceof PDFDict ? item : undefined;
    });
  }
  return [];
}

/**
Return the decoded contents of a stream, applying each filter named in its
`Filter` entry in order (PDF32000_2008.pdf:7.3.8.2).
*/
export function decodeStream(stream: PDFStream): Buffer {
  if (stream instanceof PDFContentStream) {
    return Buffer.from(stream.getUnencodedContents());
  }
  if (!(stream instanceof PDFRawStream)) {
    throw new Error(`Cannot decode stream of type ${stream.constructor.name}`);
  }
  const filters = filterNames(stream.dict.lookup(PDFName.of('Filter')));
  const decodeParms = filterParms(stream.dict.lookup(PDFName.of('DecodeParms')));
  return filters.reduce((data, filter, index) => {
    const decoder = decoders.get(filter);
    if (decoder === undefined) {
      throw new Error(`Unsupported stream filter: ${filter}`);
    }
    return Buffer.from(decoder(data, decodeParms[index]));
  }, Buffer.from(stream.getContents()));
}
