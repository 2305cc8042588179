/**
 * Stringprep profiles for JID components (RFC 3454 / RFC 3491 / RFC 3920).
 *
 * The normalizer consumes the {@link Stringprep} interface and never depends
 * on a particular implementation. {@link defaultStringprep} builds the three
 * profiles from the platform's Unicode support: String.prototype.normalize
 * for NFKC, Unicode property escapes for the prohibition tables, and tr46
 * for IDNA ToASCII.
 */

import tr46 from "tr46";

import { NormalizationError } from "./errors.js";

/**
 * Preparation profiles consumed by the component normalizer.
 *
 * Each method returns the prepared string or throws
 * {@link NormalizationError} when the input is not allowed.
 */
export interface Stringprep {
  nodeprep(input: string): string;
  nameprep(input: string): string;
  resourceprep(input: string): string;
  /** IDNA ToASCII (ASCII-compatible encoding) of a domain name. */
  toASCII(domain: string): string;
}

// B.1: commonly mapped to nothing.
const MAPPED_TO_NOTHING_RE =
  /[\u00AD\u034F\u1806\u180B-\u180D\u200B-\u200D\u2060\uFE00-\uFE0F\uFEFF]/gu;

// C.1.2: non-ASCII space characters.
const NON_ASCII_SPACE_RE = /[\u00A0\u1680\u2000-\u200B\u202F\u205F\u3000]/u;

// C.2.1: ASCII control characters.
const ASCII_CONTROL_RE = /[\u0000-\u001F\u007F]/u;

// C.2.2 through C.9, minus the code points B.1 already removed.
const PROHIBITED_RE = new RegExp(
  [
    // C.2.2 non-ASCII control characters
    "[\\u0080-\\u009F\\u06DD\\u070F\\u180E\\u200C\\u200D\\u2028\\u2029",
    "\\u2060-\\u2063\\u206A-\\u206F\\uFEFF\\uFFF9-\\uFFFC\\u{1D173}-\\u{1D17A}",
    // C.3 private use
    "\\uE000-\\uF8FF\\u{F0000}-\\u{FFFFD}\\u{100000}-\\u{10FFFD}",
    // C.4 non-character code points
    "\\uFDD0-\\uFDEF\\uFFFE\\uFFFF",
    // C.6 inappropriate for plain text
    "\\uFFFD",
    // C.7 inappropriate for canonical representation
    "\\u2FF0-\\u2FFB",
    // C.8 change display properties or deprecated
    "\\u0340\\u0341\\u200E\\u200F\\u202A-\\u202E",
    // C.9 tagging characters
    "\\u{E0001}\\u{E0020}-\\u{E007F}]",
  ].join(""),
  "u"
);

// C.4 non-characters in the supplementary planes (U+1FFFE, U+1FFFF, ...).
const PLANE_NONCHARACTER_RE = /\p{Noncharacter_Code_Point}/u;

// C.5 surrogate code points; only reachable as lone surrogates.
const LONE_SURROGATE_RE = /\p{Cs}/u;

// Appendix C of RFC 3920: characters nodeprep prohibits on top of nameprep.
const NODE_PROHIBITED_ASCII_RE = /[ "&'/:<>@]/u;

// D.1 / D.2 approximated by script: Hebrew, Arabic and the other
// right-to-left scripts versus letters of any other script.
const RAND_AL_CAT_RE =
  /[\p{Script=Hebrew}\p{Script=Arabic}\p{Script=Syriac}\p{Script=Thaana}\p{Script=Nko}\u200F\uFB1D-\uFDFF\uFE70-\uFEFC]/u;
const L_CAT_RE =
  /(?![\p{Script=Hebrew}\p{Script=Arabic}\p{Script=Syriac}\p{Script=Thaana}\p{Script=Nko}])[\p{L}\u200E]/u;

interface Profile {
  readonly name: string;
  readonly caseFold: boolean;
  readonly prohibit: readonly RegExp[];
}

const NAMEPREP: Profile = {
  name: "nameprep",
  caseFold: true,
  prohibit: [NON_ASCII_SPACE_RE],
};

const NODEPREP: Profile = {
  name: "nodeprep",
  caseFold: true,
  prohibit: [NON_ASCII_SPACE_RE, ASCII_CONTROL_RE, NODE_PROHIBITED_ASCII_RE],
};

const RESOURCEPREP: Profile = {
  name: "resourceprep",
  caseFold: false,
  prohibit: [NON_ASCII_SPACE_RE, ASCII_CONTROL_RE],
};

// B.2 full case folding: upper-casing first expands ß to SS and the
// ligatures to their letters.
function caseFold(value: string): string {
  return value.toUpperCase().toLowerCase();
}

function prepare(profile: Profile, input: string): string {
  // Map
  let out = input.replace(MAPPED_TO_NOTHING_RE, "");
  if (profile.caseFold) {
    out = caseFold(out);
  }

  // Normalize
  out = out.normalize("NFKC");
  if (profile.caseFold) {
    out = caseFold(out);
  }

  // Prohibit
  for (const re of [
    ...profile.prohibit,
    PROHIBITED_RE,
    PLANE_NONCHARACTER_RE,
    LONE_SURROGATE_RE,
  ]) {
    const m = re.exec(out);
    if (m) {
      throw new NormalizationError(
        profile.name,
        input,
        `prohibited code point U+${codePointHex(m[0])}`
      );
    }
  }

  // Check bidi
  if (RAND_AL_CAT_RE.test(out)) {
    if (L_CAT_RE.test(out)) {
      throw new NormalizationError(
        profile.name,
        input,
        "mixes left-to-right and right-to-left characters"
      );
    }
    const chars = [...out];
    if (
      !RAND_AL_CAT_RE.test(chars[0]) ||
      !RAND_AL_CAT_RE.test(chars[chars.length - 1])
    ) {
      throw new NormalizationError(
        profile.name,
        input,
        "right-to-left text must start and end with a right-to-left character"
      );
    }
  }

  return out;
}

// A DNS label holds at most 63 octets.
const MAX_LABEL_LENGTH = 63;

// Full stop and the ideographic and fullwidth dots IDNA treats as one.
const LABEL_SEPARATOR_RE = /[.\u3002\uFF0E\uFF61]/u;

function codePointHex(ch: string): string {
  return (ch.codePointAt(0) ?? 0).toString(16).toUpperCase().padStart(4, "0");
}

/**
 * Stringprep built on the platform's Unicode data.
 */
export const defaultStringprep: Stringprep = Object.freeze({
  nodeprep(input: string): string {
    return prepare(NODEPREP, input);
  },

  nameprep(input: string): string {
    return prepare(NAMEPREP, input);
  },

  resourceprep(input: string): string {
    return prepare(RESOURCEPREP, input);
  },

  toASCII(domain: string): string {
    if (domain === "") {
      throw new NormalizationError("toASCII", domain, "empty domain");
    }
    if (domain.split(LABEL_SEPARATOR_RE).includes("")) {
      throw new NormalizationError("toASCII", domain, "empty label");
    }
    // Labels are transcoded one by one; numeric labels are left alone.
    const ascii = tr46.toASCII(domain, {
      checkBidi: true,
      checkHyphens: false,
      checkJoiners: true,
      useSTD3ASCIIRules: true,
      verifyDNSLength: false,
    });
    if (ascii === null) {
      throw new NormalizationError("toASCII", domain, "not a valid domain name");
    }
    for (const label of ascii.split(".")) {
      if (label === "") {
        throw new NormalizationError("toASCII", domain, "empty label");
      }
      if (label.length > MAX_LABEL_LENGTH) {
        throw new NormalizationError(
          "toASCII",
          domain,
          `label longer than ${MAX_LABEL_LENGTH} characters`
        );
      }
    }
    return ascii;
  },
});
