/**
 * User-facing texts. The bot speaks Spanish.
 */

export const messages = {
  welcome: (name?: string) =>
    name ? `¡Hola ${name}! Bienvenido. ¿En qué puedo ayudarte hoy?` : '¡Hola! Bienvenido. ¿En qué puedo ayudarte hoy?',
  restarted: 'He reiniciado nuestra conversación. ¿En qué puedo ayudarte?',
  askTicketSubject:
    'Parece que necesitas ayuda con un problema. ¿Podrías proporcionar un breve título o asunto para tu ticket de soporte?',
  askTicketDescription: 'Gracias. Por favor describe el problema en detalle.',
  ticketCreated: '¡Gracias! Tu ticket ha sido creado. Un agente de soporte te contactará pronto.',
  ticketFailed: 'Lo siento, no pudimos registrar tu ticket. Por favor, inténtalo de nuevo más tarde.',
  textOnly: 'Lo siento, actualmente solo puedo procesar mensajes de texto.',

  // Assistant outcomes
  assistantNotConfigured: 'Error: No se ha configurado un asistente. Contacta al administrador.',
  assistantRunFailed: 'Lo siento, hubo un problema al procesar tu mensaje.',
  assistantTimeout: 'Lo siento, la respuesta está tomando demasiado tiempo.',
  assistantNoText: 'No se encontró una respuesta de texto.',
  unexpectedError: 'Lo siento, ha ocurrido un error inesperado. Por favor, inténtalo de nuevo más tarde.',

  // Sweeper notices
  inactivityWarning: (minutesLeft: number) =>
    `¿Sigues ahí? Tu sesión se cerrará por inactividad en ${minutesLeft} minutos.`,
  sessionClosed:
    'Tu sesión ha sido cerrada debido a inactividad. Puedes iniciar una nueva conversación cuando lo necesites.',
} as const;
