/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/** Invalid render options (band height, worker count, reflection budget) */
export class RenderConfigError extends Error {
  constructor(
    message: string,
    public details?: string
  ) {
    super(message);
    this.name = 'RenderConfigError';
  }
}

/** A render worker failed, exited, or answered with something unexpected */
export class RenderWorkerError extends Error {
  constructor(
    message: string,
    public details?: string
  ) {
    super(message);
    this.name = 'RenderWorkerError';
  }
}
