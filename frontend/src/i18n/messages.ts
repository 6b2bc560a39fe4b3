export const messages = {
  itemAdded: "Producto agregado al carrito",
  cartSaveFailed: "No se pudo guardar el carrito",
  cartEmpty: "El carrito está vacío",
  cartEmptyState: "Tu carrito está vacío",
  submitting: "Enviando pedido...",
  submit: "Enviar pedido",
  orderSent: "Pedido enviado correctamente",
  orderFailed: "Error al enviar el pedido",
} as const;
