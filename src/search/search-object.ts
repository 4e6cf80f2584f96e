import { SearchBuilder } from './builder.js';

/**
 * Entry point for the search builder.
 *
 * @example
 * search.field('first_name').equals()
 *   .field('last_name').beginsWith()
 *   .field('created').sql('people.created_at').type('date').greaterThanOrEqualTo()
 *   .build({ timeZone: 'Europe/Berlin' })
 */
export const search = {
  field(name: string): SearchBuilder {
    return new SearchBuilder([{ name }]);
  },
};
