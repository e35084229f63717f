import type { UploadState } from '../types/upload.js';
import type { NetDepotError } from '../errors/index.js';

// ========== Transition Table ==========

const UPLOAD_TRANSITIONS: Record<UploadState, UploadState[]> = {
  received: ['parsed', 'rejected'],
  parsed: ['verified', 'rejected'],
  verified: ['compressed', 'rejected'],
  compressed: ['stored', 'rejected'],
  stored: [],
  rejected: [],
};

export function isTerminalUploadState(state: UploadState): boolean {
  return UPLOAD_TRANSITIONS[state].length === 0;
}

export function isValidUploadTransition(
  from: UploadState,
  to: UploadState,
): boolean {
  return UPLOAD_TRANSITIONS[from].includes(to);
}

// ========== Events ==========

export type UploadEvent =
  | { type: 'NAME_PARSED' }
  | { type: 'CONTENT_VERIFIED' }
  | { type: 'CONTENT_COMPRESSED' }
  | { type: 'ARTIFACT_STORED' }
  | { type: 'REJECT'; error: NetDepotError };

export interface UploadTransitionResult {
  success: boolean;
  newState: UploadState;
  error?: string;
}

// ========== State Machine ==========

export class UploadStateMachine {
  private state: UploadState = 'received';
  private rejectedAt?: UploadState;

  getState(): UploadState {
    return this.state;
  }

  isTerminal(): boolean {
    return isTerminalUploadState(this.state);
  }

  /**
   * State the upload was in when it was rejected
   */
  getRejectedAt(): UploadState | undefined {
    return this.rejectedAt;
  }

  transition(event: UploadEvent): UploadTransitionResult {
    const targetState = this.getTargetState(event);

    if (!targetState) {
      return {
        success: false,
        newState: this.state,
        error: `Invalid event ${event.type} for state ${this.state}`,
      };
    }

    if (!isValidUploadTransition(this.state, targetState)) {
      return {
        success: false,
        newState: this.state,
        error: `Invalid transition from ${this.state} to ${targetState}`,
      };
    }

    if (targetState === 'rejected') {
      this.rejectedAt = this.state;
    }
    this.state = targetState;
    return {
      success: true,
      newState: this.state,
    };
  }

  private getTargetState(event: UploadEvent): UploadState | null {
    switch (event.type) {
      case 'NAME_PARSED':
        return this.state === 'received' ? 'parsed' : null;

      case 'CONTENT_VERIFIED':
        return this.state === 'parsed' ? 'verified' : null;

      case 'CONTENT_COMPRESSED':
        return this.state === 'verified' ? 'compressed' : null;

      case 'ARTIFACT_STORED':
        return this.state === 'compressed' ? 'stored' : null;

      case 'REJECT':
        return isTerminalUploadState(this.state) ? null : 'rejected';

      default:
        return null;
    }
  }
}
