// Combining marks for the single-character accent macros
const ACCENT_MARKS: Record<string, string> = {
	'"': "\u0308",
	"'": "\u0301",
	"`": "\u0300",
	"^": "\u0302",
	"~": "\u0303",
	"=": "\u0304",
	".": "\u0307",
	u: "\u0306",
	v: "\u030C",
	H: "\u030B",
	c: "\u0327",
	k: "\u0328",
	r: "\u030A",
};

const SPECIAL_LETTERS: Record<string, string> = {
	ss: "ß",
	ae: "æ",
	AE: "Æ",
	oe: "œ",
	OE: "Œ",
	aa: "å",
	AA: "Å",
	o: "ø",
	O: "Ø",
	l: "ł",
	L: "Ł",
	i: "ı",
	j: "ȷ",
};

const TEXT_MACROS: Record<string, string> = {
	LaTeX: "LaTeX",
	TeX: "TeX",
	ldots: "…",
	dots: "…",
	textendash: "–",
	textemdash: "—",
	textbackslash: "\uE003",
};

// Placeholders keep escaped characters away from the brace/math stripping
const ESCAPED_PLACEHOLDERS: Record<string, string> = {
	"{": "\uE000",
	"}": "\uE001",
	$: "\uE002",
};

function accent(mark: string, letter: string): string {
	return (letter + ACCENT_MARKS[mark]).normalize("NFC");
}

/**
 * Convert LaTeX markup in a BibTeX field value to the plain text it renders
 * as. `\textbf{Deep} {Learning}` becomes `Deep Learning`, `Schr\"{o}dinger`
 * becomes `Schrödinger`.
 */
export function cleanLatex(text: string): string {
	let result = text
		// \"o, \"{o}, \'{\i}
		.replace(/\\(["'`^~=.])\s*\{?\s*(\\[ij]|[A-Za-z])\s*\}?/g, (_, mark: string, letter: string) =>
			accent(mark, letter === "\\i" ? "i" : letter === "\\j" ? "j" : letter)
		)
		// \c{c}, \v s, \H{o}
		.replace(/\\([uvHckr])(?:\s*\{\s*([A-Za-z])\s*\}|\s+([A-Za-z]))/g, (_, mark: string, braced?: string, bare?: string) =>
			accent(mark, braced ?? bare ?? "")
		)
		.replace(/\\(ss|ae|AE|oe|OE|aa|AA|o|O|l|L|i|j)(?![A-Za-z])(?:\s*\{\}|\s+)?/g, (_, name: string) => SPECIAL_LETTERS[name])
		.replace(/\\(LaTeX|TeX|ldots|dots|textendash|textemdash|textbackslash)(?![A-Za-z])(?:\s*\{\})?/g, (_, name: string) => TEXT_MACROS[name])
		.replace(/\\([{}$])/g, (_, char: string) => ESCAPED_PLACEHOLDERS[char])
		.replace(/\\([&%#_])/g, "$1");

	// \command{arg} → arg, innermost first
	let previous: string;
	do {
		previous = result;
		result = result.replace(/\\[a-zA-Z]+\*?\s*\{([^{}]*)\}/g, "$1");
	} while (result !== previous);

	result = result
		.replace(/\$/g, "")
		.replace(/[{}]/g, "")
		.replace(/\\\\/g, " ")
		// Remaining argument-less macros render as nothing
		.replace(/\\[a-zA-Z]+\s*/g, "")
		.replace(/---/g, "—")
		.replace(/--/g, "–")
		.replace(/~/g, " ")
		.replace(/\s+/g, " ")
		.trim();

	return result
		.replace(/\uE000/g, "{")
		.replace(/\uE001/g, "}")
		.replace(/\uE002/g, "$")
		.replace(/\uE003/g, "\\");
}
