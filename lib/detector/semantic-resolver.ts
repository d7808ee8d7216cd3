/**
 * SemanticResolver
 *
 * In-page helpers shared by the detector scripts. They are kept as source
 * strings and spliced into each `page.evaluate` call, so the page needs no
 * prior injection and nothing leaks between pages.
 */

export const semanticResolverSource = `
    const describeElement = (el) => {
        if (!el || !el.tagName) return 'unknown';
        const tag = el.tagName.toLowerCase();
        const id = el.id ? '#' + el.id : '';
        const cls = el.className && typeof el.className === 'string'
            ? el.className.trim().split(/\\s+/).filter(Boolean).slice(0, 2).map(c => '.' + c).join('')
            : '';
        return tag + id + cls;
    };

    const visibleText = (el, max) => {
        const text = (el.innerText || el.textContent || '').trim().replace(/\\s+/g, ' ');
        return text.length > max ? text.slice(0, max) : text;
    };

    const isVisible = (el) => {
        const style = window.getComputedStyle(el);
        if (style.display === 'none' || style.visibility === 'hidden') return false;
        const rect = el.getBoundingClientRect();
        return rect.width > 0 && rect.height > 0;
    };
`;

/**
 * Wrap a function body so it runs with the shared helpers in scope.
 * The body must `return` a JSON-serializable value.
 */
export function inPageScript(body: string): string {
    return `(function() {
${semanticResolverSource}
${body}
})()`;
}

/** Same as `inPageScript` for bodies that need to await. */
export function inPageAsyncScript(body: string): string {
    return `(async function() {
${semanticResolverSource}
${body}
})()`;
}
