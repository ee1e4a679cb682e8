/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/** Error thrown when OBJ text describes geometry that cannot be built */
export class ObjParseError extends Error {
  constructor(
    message: string,
    public line: number,
    public details?: string
  ) {
    super(`${message} (line ${line})`);
    this.name = 'ObjParseError';
  }
}
