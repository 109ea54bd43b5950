// ============================================
// MELIAPP - Toast Notifications (browser)
// ============================================

const TOAST_DURATION_MS = 2500;

export function showToast(message: string, durationMs: number = TOAST_DURATION_MS): HTMLElement {
  const toast = document.createElement('div');
  toast.className = 'toast';
  toast.setAttribute('role', 'status');
  toast.textContent = message;
  document.body.appendChild(toast);

  setTimeout(() => toast.remove(), durationMs);
  return toast;
}
