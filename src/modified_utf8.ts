import { MalformedModifiedUtf8Error, hex } from './errors.js';

function isContinuation(byte: number): boolean {
    return (byte & 0xC0) === 0x80;
}

function isSurrogate(codePoint: number): boolean {
    return codePoint >= 0xD800 && codePoint <= 0xDFFF;
}

function formatBytes(bytes: readonly number[]): string {
    return `[${bytes.map(hex).join(', ')}]`;
}

/**
 * Decodes the class file's "modified UTF-8": no raw NUL bytes (U+0000 is
 * written as C0 80) and supplementary characters written as a pair of
 * three-byte surrogate encodings.
 */
export function decodeModifiedUtf8(bytes: Uint8Array): string {
    let out = '';
    let i = 0;

    // Reads `count` bytes starting at `start`; positions before `checkFrom` are not continuation-checked.
    const take = (start: number, count: number, checkFrom: number): number[] => {
        if (start + count > bytes.length) {
            const present = Array.from(bytes.subarray(start, bytes.length));
            throw new MalformedModifiedUtf8Error(start, present, `truncated sequence ${formatBytes(present)}, expected ${count} bytes`);
        }
        const sequence = Array.from(bytes.subarray(start, start + count));
        for (let k = checkFrom; k < count; k++) {
            if (!isContinuation(sequence[k])) {
                throw new MalformedModifiedUtf8Error(start, sequence, `invalid continuation byte ${hex(sequence[k])} in ${formatBytes(sequence)}`);
            }
        }
        return sequence;
    };

    while (i < bytes.length) {
        const b1 = bytes[i];

        if (b1 === 0 || b1 >= 0xF0 || isContinuation(b1)) {
            throw new MalformedModifiedUtf8Error(i, [b1], `invalid leading byte ${hex(b1)}`);
        }

        if (b1 <= 0x7F) {
            out += String.fromCharCode(b1);
            i += 1;
            continue;
        }

        if ((b1 & 0xE0) === 0xC0) {
            const [, b2] = take(i, 2, 1);
            out += String.fromCharCode(((b1 & 0x1F) << 6) | (b2 & 0x3F));
            i += 2;
            continue;
        }

        // 1110xxxx
        const [, b2, b3] = take(i, 3, 1);

        if (b1 === 0xED && (b2 & 0xF0) === 0xA0) {
            // High surrogate: the low half must follow as ED Bx xx.
            const sequence = take(i, 6, 5);
            const [, , , b4, b5, b6] = sequence;
            if (b4 !== 0xED || (b5 & 0xF0) !== 0xB0) {
                throw new MalformedModifiedUtf8Error(i, sequence, `invalid continuation byte ${hex(b4 !== 0xED ? b4 : b5)} in ${formatBytes(sequence)}`);
            }
            const codePoint = 0x10000 + ((b2 & 0x0F) << 16) + ((b3 & 0x3F) << 10) + ((b5 & 0x0F) << 6) + (b6 & 0x3F);
            out += String.fromCodePoint(codePoint);
            i += 6;
            continue;
        }

        const codePoint = ((b1 & 0x0F) << 12) | ((b2 & 0x3F) << 6) | (b3 & 0x3F);
        if (isSurrogate(codePoint)) {
            throw new MalformedModifiedUtf8Error(i, [b1, b2, b3], `invalid codepoint ${hex(codePoint)}`);
        }
        out += String.fromCharCode(codePoint);
        i += 3;
    }

    return out;
}
