/**
 * Delivery of invitation and password-reset links. The real sender is an
 * external collaborator; the console mailer only logs that a message went out.
 */
export interface TokenMailer {
  sendInvitation(email: string, token: string, domain: string, role?: string): Promise<void>;
  sendPasswordReset(email: string, token: string, domain: string): Promise<void>;
}

export class ConsoleMailer implements TokenMailer {
  async sendInvitation(email: string, _token: string, domain: string, role?: string): Promise<void> {
    console.log(`[mail] invitation for ${email} to ${domain}${role ? ` as ${role}` : ''}`);
  }

  async sendPasswordReset(email: string, _token: string, domain: string): Promise<void> {
    console.log(`[mail] password reset for ${email} in ${domain}`);
  }
}
