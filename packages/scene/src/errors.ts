/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Error thrown for an invalid scene description. `details` holds the path of the
 * offending value, e.g. `objects[2].transform[0]`.
 */
export class SceneError extends Error {
  constructor(
    message: string,
    public details?: string
  ) {
    super(details ? `${details}: ${message}` : message);
    this.name = 'SceneError';
  }
}
