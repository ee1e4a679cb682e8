/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/** Error thrown when a shape tree is assembled or queried incorrectly */
export class SceneGraphError extends Error {
  constructor(
    message: string,
    public details?: string
  ) {
    super(message);
    this.name = 'SceneGraphError';
  }
}
