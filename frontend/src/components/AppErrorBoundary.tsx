import { Component, type ErrorInfo, type ReactNode } from "react";

import { createLogger } from "../logging/logger";
import { AppCrashedPage } from "../pages/AppCrashedPage";

const logger = createLogger("ui");

type AppErrorBoundaryProps = {
  children: ReactNode;
};

type AppErrorBoundaryState = {
  hasError: boolean;
};

export class AppErrorBoundary extends Component<AppErrorBoundaryProps, AppErrorBoundaryState> {
  public state: AppErrorBoundaryState = { hasError: false };

  public static getDerivedStateFromError(): AppErrorBoundaryState {
    return { hasError: true };
  }

  public componentDidCatch(error: Error, errorInfo: ErrorInfo): void {
    logger.error("cart render error", {
      message: error.message,
      stack: error.stack,
      componentStack: errorInfo.componentStack,
    });
  }

  private readonly retry = (): void => {
    logger.info("cart render retry");
    this.setState({ hasError: false });
  };

  public render(): ReactNode {
    if (this.state.hasError) {
      return <AppCrashedPage onRetry={this.retry} />;
    }
    return this.props.children;
  }
}
