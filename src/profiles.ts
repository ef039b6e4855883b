/**
 * Documentation site profiles
 *
 * Everything the scraper needs to know about one component-library docs site:
 * where the API and demo pages live, and which selectors and id prefixes pick
 * out the prop table, the CSS class table, the demo sections and their code.
 *
 * `{component}` in a template is replaced with the lower-cased component
 * name, `{Component}` with the name as given.
 */

export interface DocsSiteProfile {
    /** Human-readable name of the profile */
    name: string;
    /** API reference page, e.g. https://mui.com/material-ui/api/button/ */
    api_url_template: string;
    /** Demo page, e.g. https://mui.com/material-ui/react-button/ */
    demo_url_template: string;
    /** Selector for one demo section (rendered preview + code) */
    demo_section_selector: string;
    /** Selector for the element holding a demo's JSX source */
    code_selector: string;
    /** Class every rendered instance of the component carries */
    root_class_template: string;
    /** id prefix of prop table rows */
    prop_row_prefix_template: string;
    /** id prefix of CSS class table rows */
    class_row_prefix_template: string;
    /** Suffix stripped from the API page's <h1> to get the component name */
    api_title_suffix: string;
}

export const MUI_PROFILE: DocsSiteProfile = {
    name: 'Material UI',
    api_url_template: 'https://mui.com/material-ui/api/{component}/',
    demo_url_template: 'https://mui.com/material-ui/react-{component}/',
    demo_section_selector: 'div[id^="demo-"]',
    code_selector: 'textarea.npm__react-simple-code-editor__textarea',
    root_class_template: 'Mui{Component}-root',
    prop_row_prefix_template: '{component}-prop-',
    class_row_prefix_template: '{component}-classes-',
    api_title_suffix: ' API',
};

/** Fills `{component}` / `{Component}` in a profile template. */
export function resolveTemplate(template: string, component: string): string {
    return template
        .replace(/\{component\}/g, component.toLowerCase())
        .replace(/\{Component\}/g, component);
}
