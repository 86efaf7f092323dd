/**
 * content/code.ts
 * Language registry for script-side tooling: line-comment syntax and
 * lookup by id/alias.
 *
 * Percent scripts only need the line-comment prefix, so block comment
 * fences are not tracked here.
 */

export type CommentStyle = {
    /** Line-comment prefixes, preferred one first. */
    readonly line: readonly string[];
};

export type LanguageSpec = {
    readonly id: string;
    readonly aliases?: readonly string[];
    readonly comment: CommentStyle;
};

const _registry = new Map<string, LanguageSpec>();

export function registerLanguage(spec: LanguageSpec): void {
    if (spec.comment.line.length === 0) {
        throw new Error(
            `registerLanguage: "${spec.id}" needs at least one line-comment prefix.`,
        );
    }
    _registry.set(spec.id, spec);
    for (const alias of spec.aliases ?? []) _registry.set(alias, spec);
}

export function getLanguageByIdOrAlias(
    idOrAlias: string,
): LanguageSpec | undefined {
    return _registry.get(idOrAlias);
}

export function lineCommentPrefix(spec: LanguageSpec): string {
    return spec.comment.line[0];
}

/** Preload the languages Jupyter kernels commonly speak */
(function preloadLanguages() {
    registerLanguage({
        id: "python",
        aliases: ["py", "python3"],
        comment: { line: ["#"] },
    });
    registerLanguage({ id: "r", aliases: ["R"], comment: { line: ["#"] } });
    registerLanguage({ id: "julia", aliases: ["jl"], comment: { line: ["#"] } });
    registerLanguage({
        id: "shell",
        aliases: ["bash", "sh", "zsh"],
        comment: { line: ["#"] },
    });
    registerLanguage({
        id: "typescript",
        aliases: ["ts", "javascript", "js"],
        comment: { line: ["//"] },
    });
    registerLanguage({ id: "sql", comment: { line: ["--"] } });
    registerLanguage({ id: "lua", comment: { line: ["--"] } });
})();
