/** Outcome of the alumni validation form, rendered back into the page. */
export interface AlumniActionState {
  status: 'idle' | 'success' | 'error';
  message: string;
}
