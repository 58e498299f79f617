import './Header.css';

interface HeaderProps {
  subtitle: string;
}

function Header({ subtitle }: HeaderProps) {
  return (
    <header className="header">
      <div className="header-content">
        <h1 className="header-title">Isometric District</h1>
        <p className="header-subtitle">{subtitle}</p>
      </div>
    </header>
  );
}

export default Header;
