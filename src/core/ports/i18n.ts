/**
 * Localisation Port
 *
 * Every user-visible sentence goes through a Translator. Templates keep
 * their `{placeholder}` markers; callers fill them after translation.
 */

export interface Translator {
  translate(template: string): string;
  pluralize(singular: string, plural: string, count: number): string;
}

export const englishTranslator: Translator = {
  translate(template: string): string {
    return template;
  },

  pluralize(singular: string, plural: string, count: number): string {
    return count === 1 ? singular : plural;
  }
};
